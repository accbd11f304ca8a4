import { Command } from 'commander';
import { version } from '../package.json';
import { registerDumpCommand } from './commands/dump';
import { registerStatsCommand } from './commands/stats';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('repodump')
    .description('Flatten a file tree into one deterministic, token-budgeted dump')
    .version(version)
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerDumpCommand(program);
  registerStatsCommand(program);

  return program;
}
