import fs from 'fs';
import path from 'path';
import { Command } from 'commander';
import pc from 'picocolors';
import type { z } from 'zod';
import {
  EncodingSchema,
  OutputFormatSchema,
  TreeSortKeySchema,
  UsageError,
  formatTokens,
} from '@repodump/shared';
import { parseByteSize, parseTokenCount, type ConfigOverrides, type DumpResult } from '@repodump/core';
import { render } from '../output';
import { loadAndRun } from './common';

export type DumpCommandOptions = {
  include?: string[];
  exclude?: string[];
  maxSize?: string;
  maxTokens?: string;
  format?: string;
  encoding?: string;
  binaryStrict: boolean;
  gitignore: boolean;
  defaultExcludes: boolean;
  tree: boolean;
  treeDepth?: string;
  treeTokens: boolean;
  treeSize?: boolean;
  treeSort?: string;
  treeFilesFirst?: boolean;
  outfile?: string;
  stdout: boolean;
};

function parseChoice<T extends [string, ...string[]]>(schema: z.ZodEnum<T>, value: string, flag: string): T[number] {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new UsageError(`Invalid ${flag}: ${value} (expected one of ${schema.options.join(', ')})`);
  }
  return result.data;
}

function parseDepth(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`Invalid --tree-depth: ${value} (expected a whole number)`);
  }
  return parseInt(value, 10);
}

/**
 * Turns the flags the user actually typed into config overrides. Negatable
 * flags only count when given on the command line, so their defaults never
 * mask a value from a config file.
 */
export function buildOverrides(command: Command): ConfigOverrides {
  const opts = command.opts<DumpCommandOptions>();
  const fromCli = (key: keyof DumpCommandOptions) => command.getOptionValueSource(key) === 'cli';
  const overrides: ConfigOverrides = {};

  if (opts.include) overrides.include = opts.include;
  if (opts.exclude) overrides.exclude = opts.exclude;
  if (fromCli('binaryStrict')) overrides.binaryStrict = opts.binaryStrict;
  if (fromCli('gitignore')) overrides.gitignore = opts.gitignore;
  if (fromCli('defaultExcludes')) overrides.defaultExcludes = opts.defaultExcludes;
  if (opts.encoding !== undefined) overrides.encoding = parseChoice(EncodingSchema, opts.encoding, '--encoding');

  const budget: NonNullable<ConfigOverrides['budget']> = {};
  if (opts.maxSize !== undefined) budget.maxSizeBytes = parseByteSize(opts.maxSize);
  if (opts.maxTokens !== undefined) budget.maxTokens = parseTokenCount(opts.maxTokens);
  if (Object.keys(budget).length > 0) overrides.budget = budget;

  const tree: NonNullable<ConfigOverrides['tree']> = {};
  if (fromCli('tree')) tree.enabled = opts.tree;
  if (opts.treeDepth !== undefined) tree.maxDepth = parseDepth(opts.treeDepth);
  if (fromCli('treeTokens')) tree.showTokens = opts.treeTokens;
  if (opts.treeSize) tree.showSize = true;
  if (opts.treeSort !== undefined) tree.sortBy = parseChoice(TreeSortKeySchema, opts.treeSort, '--tree-sort');
  if (opts.treeFilesFirst) tree.dirsFirst = false;
  if (Object.keys(tree).length > 0) overrides.tree = tree;

  const output: NonNullable<ConfigOverrides['output']> = {};
  if (opts.format !== undefined) output.format = parseChoice(OutputFormatSchema, opts.format, '--format');
  if (opts.outfile !== undefined) output.outfile = opts.outfile;
  if (fromCli('stdout')) output.stdout = opts.stdout;
  if (Object.keys(output).length > 0) overrides.output = output;

  return overrides;
}

export function completionLine(result: DumpResult, outfile?: string): string {
  const { summary } = result;
  const emitted = summary.includedCount + summary.truncatedCount;
  const parts = [`${pc.green('✔')} ${emitted} files, ${formatTokens(summary.totalTokens)} tokens`];
  if (summary.truncatedCount > 0 || summary.droppedCount > 0) {
    parts.push(pc.yellow(`${summary.truncatedCount} truncated, ${summary.droppedCount} dropped`));
  }
  if (summary.warnings.length > 0) {
    parts.push(pc.yellow(`${summary.warnings.length} warnings`));
  }
  if (outfile) {
    parts.push(`written to ${pc.cyan(outfile)}`);
  }
  return parts.join(', ');
}

export function registerDumpCommand(program: Command) {
  program
    .command('dump [path]', { isDefault: true })
    .description('Flatten a directory into a single text, JSON or HTML dump')
    .option('--include <glob...>', 'Only dump files matching these globs')
    .option('--exclude <glob...>', 'Skip paths matching these globs')
    .option('--max-size <bytes>', 'Skip files larger than this (e.g. 512kb, 2mb)')
    .option('--max-tokens <n>', 'Truncate or drop the largest files to fit (e.g. 800, 12k)')
    .option('--format <format>', 'Output format: text, json or html')
    .option('--encoding <encoding>', 'Text encoding: utf-8, utf-16le or latin1')
    .option('--no-binary-strict', 'Only treat NUL bytes and binary extensions as binary')
    .option('--no-gitignore', 'Ignore .gitignore files')
    .option('--no-default-excludes', 'Include .git, .hg and .svn directories')
    .option('--no-tree', 'Leave out the directory tree')
    .option('--tree-depth <n>', 'Collapse directories at this depth and below')
    .option('--no-tree-tokens', 'Hide token counts in the tree')
    .option('--tree-size', 'Show byte sizes in the tree')
    .option('--tree-sort <key>', 'Sort tree entries by name, size or tokens')
    .option('--tree-files-first', 'List files before directories')
    .option('--outfile <path>', 'Also write the dump to this file')
    .option('--no-stdout', 'Do not write the dump to stdout')
    .action((target: string | undefined, _options: DumpCommandOptions, command: Command) => {
      const { config, result } = loadAndRun(target, command, buildOverrides(command));
      const { output, tree } = config;
      if (!output.stdout && !output.outfile) {
        throw new UsageError('Nothing to write: --no-stdout needs --outfile');
      }

      const text = render(result, output.format, { showTokens: tree.showTokens, showSize: tree.showSize });
      if (output.outfile) {
        fs.writeFileSync(path.resolve(output.outfile), text, 'utf8');
      }
      if (output.stdout) {
        process.stdout.write(text);
      }
      console.error(completionLine(result, output.outfile));
    });
}
