import { isEmitted } from '@repodump/repo';
import type { DumpResult } from '@repodump/core';
import { summaryLines } from './text';
import { treeLines, type TreeDisplay } from './tree';

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

const STYLE = `body { font-family: system-ui, sans-serif; margin: 2rem; }
pre { background: #f6f8fa; padding: 1rem; overflow-x: auto; }
h2 { font-family: ui-monospace, monospace; font-size: 1rem; }`;

/** Standalone HTML page; every piece of file text is escaped. */
export function renderHtml(result: DumpResult, display: TreeDisplay): string {
  const title = escapeHtml(result.rootName);
  const body: string[] = [
    `<h1>${title}</h1>`,
    `<pre class="summary">${escapeHtml(summaryLines(result.rootName, result.summary).join('\n'))}</pre>`,
  ];

  if (result.tree) {
    const tree = treeLines(result.tree, result.rootName, display).join('\n');
    body.push(`<pre class="tree">${escapeHtml(tree)}</pre>`);
  }

  for (const record of result.records) {
    if (!isEmitted(record)) continue;
    body.push(
      `<section class="file">`,
      `<h2>${escapeHtml(record.path)}</h2>`,
      `<pre>${escapeHtml(record.content)}</pre>`,
      `</section>`,
    );
  }

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${title}</title>`,
    `<style>\n${STYLE}\n</style>`,
    '</head>',
    '<body>',
    ...body,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}
