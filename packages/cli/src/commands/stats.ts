import { Command } from 'commander';
import pc from 'picocolors';
import { formatBytes, formatTokens } from '@repodump/shared';
import type { DumpSummary } from '@repodump/core';
import { printTable } from '../output';
import { loadAndRun } from './common';

export function summaryRows(summary: DumpSummary): { metric: string; value: string }[] {
  const budget = summary.maxTokens === undefined ? '' : ` / ${formatTokens(summary.maxTokens)}`;
  return [
    { metric: 'Files', value: String(summary.fileCount) },
    { metric: 'Directories', value: String(summary.directoryCount) },
    { metric: 'Included', value: String(summary.includedCount) },
    { metric: 'Truncated', value: String(summary.truncatedCount) },
    { metric: 'Dropped', value: String(summary.droppedCount) },
    { metric: 'Skipped (too large)', value: String(summary.skipped.SkippedTooLarge) },
    { metric: 'Skipped (binary)', value: String(summary.skipped.SkippedBinary) },
    { metric: 'Skipped (excluded)', value: String(summary.skipped.SkippedExcluded) },
    { metric: 'Skipped (unreadable)', value: String(summary.skipped.SkippedUnreadable) },
    { metric: 'Tokens', value: `${formatTokens(summary.totalTokens)}${budget}` },
    { metric: 'Size', value: formatBytes(summary.totalBytes) },
    { metric: 'Digest', value: summary.digest },
  ];
}

export function registerStatsCommand(program: Command) {
  program
    .command('stats [path]')
    .description('Show what a dump would contain without printing file contents')
    .option('--json', 'Output the summary as JSON')
    .action((target: string | undefined, options: { json?: boolean }, command: Command) => {
      const { result } = loadAndRun(target, command, {});
      const { summary } = result;

      if (options.json) {
        console.log(JSON.stringify({ root: result.rootName, ...summary }, null, 2));
        return;
      }

      console.log(pc.bold(`Dump statistics for ${result.rootName}`));
      printTable(summaryRows(summary), { head: ['Metric', 'Value'] });
      for (const warning of summary.warnings) {
        console.log(pc.yellow(`! ${warning.path ? `${warning.path}: ` : ''}${warning.message}`));
      }
    });
}
