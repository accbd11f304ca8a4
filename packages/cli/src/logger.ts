import { Console } from 'console';
import { ConsoleLogger, type Logger } from '@repodump/shared';

/**
 * Logs to stderr only, so a dump written to stdout is never interleaved with
 * diagnostics. `--verbose` lowers the threshold to debug.
 */
export function createCliLogger(verbose: boolean): Logger {
  return new ConsoleLogger({
    level: verbose ? 'debug' : 'warn',
    sink: new Console({ stdout: process.stderr, stderr: process.stderr }),
  });
}
