import { CommanderError } from 'commander';
import pc from 'picocolors';
import { AppError, isUserError } from '@repodump/shared';
import { buildProgram } from './program';
import type { GlobalOptions } from './types';

export const name = '@repodump/cli';
export { buildProgram };

/**
 * Runs the CLI and resolves to its exit code: 0 on success, 2 for config and
 * usage errors, 1 for anything else.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed its own message
      return e.exitCode === 0 ? 0 : 2;
    }

    const { verbose } = program.opts<GlobalOptions>();
    console.error(pc.red(`Error: ${(e instanceof Error && e.message) || String(e)}`));
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }

    return isUserError(e) ? 2 : 1;
  }
}
