import path from 'path';
import type { Command } from 'commander';
import { ConfigLoader, runDump, type ConfigOverrides, type DumpResult } from '@repodump/core';
import type { DumpConfig } from '@repodump/shared';
import { createCliLogger } from '../logger';
import type { GlobalOptions } from '../types';

export interface LoadedDump {
  config: DumpConfig;
  result: DumpResult;
}

/**
 * Resolves config for `target` (its `.repodump.yaml` included) and runs the
 * pipeline. Error outcomes are rethrown for the top-level handler.
 */
export function loadAndRun(target: string | undefined, command: Command, flags: ConfigOverrides): LoadedDump {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const root = path.resolve(target ?? '.');
  const logger = createCliLogger(Boolean(globals.verbose));

  const config = ConfigLoader.load({ configPath: globals.config, cwd: root, flags });
  logger.debug(`effective config: ${JSON.stringify(config)}`);

  const outcome = runDump(root, config, { logger });
  if (outcome.status === 'error') {
    throw outcome.error;
  }
  return { config, result: outcome };
}
