import type { TreeSortKey } from '@repodump/shared';
import type { FileRecord } from '../records/types';

export interface TreeOptions {
  /** Directories at this depth or deeper are collapsed; the root is depth 0. */
  maxDepth?: number;
  sortBy?: TreeSortKey;
  /** Directories before files when true, files before directories when false. */
  dirsFirst?: boolean;
}

export interface FileNode {
  readonly kind: 'file';
  readonly name: string;
  readonly path: string;
  readonly depth: number;
  readonly record: FileRecord;
}

export interface DirectoryNode {
  readonly kind: 'directory';
  /** Empty for the scan root. */
  readonly name: string;
  readonly path: string;
  readonly depth: number;
  /** Every child by segment name, collapsed or not. */
  readonly children: ReadonlyMap<string, TreeNode>;
  /** Children to render, in sort order. Empty when collapsed. */
  readonly entries: readonly TreeNode[];
  readonly collapsed: boolean;
  /** Children left out of `entries` by collapsing. */
  readonly hiddenCount: number;
  /** Tokens of Included and Truncated descendants. */
  readonly aggregateTokens: number;
  /** Bytes of Included and Truncated descendants. */
  readonly aggregateSize: number;
  /** Descendant files of any status. */
  readonly fileCount: number;
}

export type TreeNode = DirectoryNode | FileNode;

export interface NodeCounts {
  directories: number;
  files: number;
}
