import type { DirectoryNode, FileRecord, TreeNode } from '@repodump/repo';
import type { DumpResult } from '@repodump/core';

interface JsonFile {
  path: string;
  status: FileRecord['status'];
  tokens: number;
  size: number;
  originalTokens?: number;
  lossy?: boolean;
  reason?: string;
  content?: string;
}

type JsonTreeNode =
  | { type: 'file'; name: string; path: string; status: FileRecord['status']; tokens: number; size: number }
  | {
      type: 'directory';
      name: string;
      path: string;
      tokens: number;
      size: number;
      fileCount: number;
      collapsed: boolean;
      hidden: number;
      children: JsonTreeNode[];
    };

export function toJsonFile(record: FileRecord): JsonFile {
  const file: JsonFile = {
    path: record.path,
    status: record.status,
    tokens: record.tokenCount,
    size: record.sizeBytes,
  };
  switch (record.status) {
    case 'Included':
      file.lossy = record.lossy;
      file.content = record.content;
      break;
    case 'Truncated':
      file.originalTokens = record.originalTokenCount;
      file.lossy = record.lossy;
      file.content = record.content;
      break;
    case 'Dropped':
      file.originalTokens = record.originalTokenCount;
      break;
    default:
      file.reason = record.reason;
  }
  return file;
}

export function toJsonTree(node: TreeNode): JsonTreeNode {
  if (node.kind === 'file') {
    const { record } = node;
    return {
      type: 'file',
      name: node.name,
      path: node.path,
      status: record.status,
      tokens: record.tokenCount,
      size: record.sizeBytes,
    };
  }
  return directoryJson(node);
}

function directoryJson(dir: DirectoryNode): JsonTreeNode {
  return {
    type: 'directory',
    name: dir.name,
    path: dir.path,
    tokens: dir.aggregateTokens,
    size: dir.aggregateSize,
    fileCount: dir.fileCount,
    collapsed: dir.collapsed,
    hidden: dir.hiddenCount,
    children: dir.entries.map(toJsonTree),
  };
}

/** `{ root, summary, tree, files }`, pretty-printed. */
export function renderJson(result: DumpResult): string {
  const document = {
    root: result.rootName,
    summary: result.summary,
    tree: result.tree ? toJsonTree(result.tree) : null,
    files: result.records.map(toJsonFile),
  };
  return `${JSON.stringify(document, null, 2)}\n`;
}
