import { formatBytes, formatTokens } from '@repodump/shared';
import { isEmitted, type DirectoryNode, type FileStatus, type TreeNode } from '@repodump/repo';

export interface TreeDisplay {
  showTokens: boolean;
  showSize: boolean;
}

const STATUS_TAGS: Record<Exclude<FileStatus, 'Included'>, string> = {
  Truncated: '[truncated]',
  Dropped: '[dropped]',
  SkippedBinary: '[binary]',
  SkippedTooLarge: '[too large]',
  SkippedExcluded: '[excluded]',
  SkippedUnreadable: '[unreadable]',
};

export function statusTag(status: FileStatus): string | undefined {
  return status === 'Included' ? undefined : STATUS_TAGS[status];
}

/** One tree line's text without its connector, e.g. `src/ (1.2K tok) [4.0 KB]`. */
export function nodeLabel(node: TreeNode, display: TreeDisplay, rootName = node.name): string {
  const parts: string[] = [];
  if (node.kind === 'directory') {
    parts.push(`${node.depth === 0 ? rootName : node.name}/`);
    if (display.showTokens) parts.push(`(${formatTokens(node.aggregateTokens)} tok)`);
    if (display.showSize) parts.push(`[${formatBytes(node.aggregateSize)}]`);
  } else {
    const { record } = node;
    parts.push(node.name);
    if (display.showTokens && isEmitted(record)) parts.push(`(${formatTokens(record.tokenCount)} tok)`);
    if (display.showSize) parts.push(`[${formatBytes(record.sizeBytes)}]`);
    const tag = statusTag(record.status);
    if (tag) parts.push(tag);
  }
  return parts.join(' ');
}

/**
 * Draws the visible tree with box-drawing connectors. Collapsed directories
 * get a single `… (k more)` line in place of their children.
 */
export function treeLines(root: DirectoryNode, rootName: string, display: TreeDisplay): string[] {
  const lines = [nodeLabel(root, display, rootName)];

  const walk = (dir: DirectoryNode, prefix: string) => {
    if (dir.collapsed) {
      if (dir.hiddenCount > 0) lines.push(`${prefix}└── … (${dir.hiddenCount} more)`);
      return;
    }
    dir.entries.forEach((entry, i) => {
      const last = i === dir.entries.length - 1;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${nodeLabel(entry, display)}`);
      if (entry.kind === 'directory') {
        walk(entry, `${prefix}${last ? '    ' : '│   '}`);
      }
    });
  };

  walk(root, '');
  return lines;
}
