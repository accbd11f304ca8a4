import Table from 'cli-table3';
import type { OutputFormat } from '@repodump/shared';
import type { DumpResult } from '@repodump/core';
import { renderHtml } from './html';
import { renderJson } from './json';
import { renderText } from './text';
import type { TreeDisplay } from './tree';

export { renderText, summaryLines, skippedTotal, RULER } from './text';
export { renderJson, toJsonFile, toJsonTree } from './json';
export { renderHtml, escapeHtml } from './html';
export { treeLines, nodeLabel, statusTag, type TreeDisplay } from './tree';

export function render(result: DumpResult, format: OutputFormat, display: TreeDisplay): string {
  switch (format) {
    case 'json':
      return renderJson(result);
    case 'html':
      return renderHtml(result, display);
    default:
      return renderText(result, display);
  }
}

export function printTable(
  data: Record<string, unknown>[],
  options?: Table.TableConstructorOptions,
) {
  const head = options?.head ?? Object.keys(data[0] ?? {});
  const table = new Table({ head, ...options });
  data.forEach((row) => table.push(Object.values(row).map((v) => String(v))));
  console.log(table.toString());
}
