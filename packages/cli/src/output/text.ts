import { formatBytes, formatTokens } from '@repodump/shared';
import { countNodes, isEmitted } from '@repodump/repo';
import type { DumpResult, DumpSummary } from '@repodump/core';
import { treeLines, type TreeDisplay } from './tree';

export const RULER = '='.repeat(48);

export function skippedTotal(summary: DumpSummary): number {
  return Object.values(summary.skipped).reduce((sum, n) => sum + n, 0);
}

export function summaryLines(rootName: string, summary: DumpSummary): string[] {
  const budget = summary.maxTokens === undefined ? '' : ` / ${formatTokens(summary.maxTokens)}`;
  const lines = [
    `Directory: ${rootName}`,
    `Files: ${summary.fileCount} (${summary.includedCount} included, ${summary.truncatedCount} truncated, ` +
      `${summary.droppedCount} dropped, ${skippedTotal(summary)} skipped)`,
    `Estimated tokens: ${formatTokens(summary.totalTokens)}${budget}`,
    `Total size: ${formatBytes(summary.totalBytes)}`,
  ];
  if (summary.warnings.length > 0) {
    lines.push('Warnings:');
    for (const warning of summary.warnings) {
      lines.push(`  - ${warning.path ? `${warning.path}: ` : ''}${warning.message}`);
    }
  }
  return lines;
}

function plural(count: number, one: string, many: string): string {
  return `${count} ${count === 1 ? one : many}`;
}

/**
 * Plain-text dump: summary header, directory tree, then every emitted file
 * between `=` rulers.
 */
export function renderText(result: DumpResult, display: TreeDisplay): string {
  const out = summaryLines(result.rootName, result.summary);

  if (result.tree) {
    const { directories, files } = countNodes(result.tree);
    out.push(
      '',
      'Directory structure:',
      ...treeLines(result.tree, result.rootName, display),
      '',
      `${plural(directories, 'directory', 'directories')}, ${plural(files, 'file', 'files')}`,
    );
  }

  for (const record of result.records) {
    if (!isEmitted(record)) continue;
    out.push('', RULER, `FILE: ${record.path}`, RULER, record.content);
  }

  return `${out.join('\n')}\n`;
}
