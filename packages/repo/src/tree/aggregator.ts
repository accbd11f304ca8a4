import { InvariantError, compareNames, fromSegments, type TreeSortKey } from '@repodump/shared';
import { isEmitted, type FileRecord } from '../records/types';
import type { DirectoryNode, FileNode, NodeCounts, TreeNode, TreeOptions } from './types';

interface Draft {
  children: Map<string, Draft | FileRecord>;
}

/**
 * Builds the directory view over final (post-budget) records.
 *
 * Records are inserted into a draft tree first; immutable nodes and their
 * aggregates are then produced in one bottom-up pass. Collapsing only hides
 * entries, so a collapsed directory still reports its full totals.
 */
export class TreeAggregator {
  private readonly maxDepth?: number;
  private readonly sortBy: TreeSortKey;
  private readonly dirsFirst: boolean;

  constructor(options: TreeOptions = {}) {
    this.maxDepth = options.maxDepth;
    this.sortBy = options.sortBy ?? 'name';
    this.dirsFirst = options.dirsFirst ?? true;
  }

  build(records: readonly FileRecord[]): DirectoryNode {
    const root: Draft = { children: new Map() };
    for (const record of records) {
      insert(root, record);
    }
    return this.finalize(root, []);
  }

  private finalize(draft: Draft, segments: string[]): DirectoryNode {
    const depth = segments.length;
    const children = new Map<string, TreeNode>();
    let aggregateTokens = 0;
    let aggregateSize = 0;
    let fileCount = 0;

    for (const [name, child] of draft.children) {
      const childSegments = [...segments, name];
      if (isDraft(child)) {
        const node = this.finalize(child, childSegments);
        aggregateTokens += node.aggregateTokens;
        aggregateSize += node.aggregateSize;
        fileCount += node.fileCount;
        children.set(name, node);
      } else {
        if (isEmitted(child)) {
          aggregateTokens += child.tokenCount;
          aggregateSize += child.sizeBytes;
        }
        fileCount++;
        children.set(name, { kind: 'file', name, path: child.path, depth: depth + 1, record: child });
      }
    }

    const collapsed = this.maxDepth !== undefined && depth >= this.maxDepth;
    return {
      kind: 'directory',
      name: depth === 0 ? '' : segments[depth - 1],
      path: fromSegments(segments),
      depth,
      children,
      entries: collapsed ? [] : [...children.values()].sort((a, b) => this.compare(a, b)),
      collapsed,
      hiddenCount: collapsed ? children.size : 0,
      aggregateTokens,
      aggregateSize,
      fileCount,
    };
  }

  private compare(a: TreeNode, b: TreeNode): number {
    if (a.kind !== b.kind) {
      const dirFirst = a.kind === 'directory' ? -1 : 1;
      return this.dirsFirst ? dirFirst : -dirFirst;
    }
    if (this.sortBy !== 'name') {
      const diff = weight(b, this.sortBy) - weight(a, this.sortBy);
      if (diff !== 0) return diff;
    }
    return compareNames(a.name, b.name);
  }
}

function insert(root: Draft, record: FileRecord): void {
  const segments = record.relativePath;
  if (segments.length === 0) {
    throw new InvariantError('A file record has an empty path');
  }

  let dir = root;
  for (let i = 0; i < segments.length - 1; i++) {
    const existing = dir.children.get(segments[i]);
    if (existing === undefined) {
      const next: Draft = { children: new Map() };
      dir.children.set(segments[i], next);
      dir = next;
    } else if (isDraft(existing)) {
      dir = existing;
    } else {
      throw new InvariantError(`${fromSegments(segments.slice(0, i + 1))} is both a file and a directory`);
    }
  }

  const name = segments[segments.length - 1];
  if (dir.children.has(name)) {
    throw new InvariantError(`Duplicate tree entry for ${record.path}`);
  }
  dir.children.set(name, record);
}

function isDraft(value: Draft | FileRecord): value is Draft {
  return !('status' in value);
}

/** Emitted bytes or tokens, the same measure the directory aggregates use. */
function weight(node: TreeNode, key: Exclude<TreeSortKey, 'name'>): number {
  if (node.kind === 'directory') {
    return key === 'size' ? node.aggregateSize : node.aggregateTokens;
  }
  if (!isEmitted(node.record)) return 0;
  return key === 'size' ? node.record.sizeBytes : node.record.tokenCount;
}

/** Directories and files reachable through `entries`, the root excluded. */
export function countNodes(root: DirectoryNode): NodeCounts {
  const counts: NodeCounts = { directories: 0, files: 0 };
  const visit = (node: DirectoryNode) => {
    for (const entry of node.entries) {
      if (entry.kind === 'directory') {
        counts.directories++;
        visit(entry);
      } else {
        counts.files++;
      }
    }
  };
  visit(root);
  return counts;
}

/** Yields every node under `root` depth-first, including hidden ones. */
export function* walkTree(root: DirectoryNode): Generator<TreeNode> {
  for (const child of root.children.values()) {
    yield child;
    if (child.kind === 'directory') {
      yield* walkTree(child);
    }
  }
}
