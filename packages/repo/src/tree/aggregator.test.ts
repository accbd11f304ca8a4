import { describe, it, expect } from 'vitest';
import { InvariantError } from '@repodump/shared';
import { dropRecord, includedRecord, skippedRecord } from '../records/status';
import type { FileRecord } from '../records/types';
import { TreeAggregator, countNodes, walkTree } from './aggregator';
import type { DirectoryNode, TreeNode } from './types';

function included(path: string, tokens: number, size: number) {
  return includedRecord({ relativePath: path.split('/'), sizeBytes: size }, 'x', tokens);
}

const records: FileRecord[] = [
  included('README.md', 10, 40),
  included('src/index.ts', 5, 20),
  included('src/lib/util.ts', 20, 80),
  skippedRecord({ relativePath: ['src', 'lib', 'big.bin'], sizeBytes: 999 }, 'SkippedBinary', 'contains NUL bytes'),
  dropRecord(included('docs/guide.md', 100, 400)),
];

const names = (node: TreeNode) => (node.kind === 'directory' ? node.entries.map((e) => e.name) : []);

function dir(root: DirectoryNode, ...segments: string[]): DirectoryNode {
  let node: TreeNode = root;
  for (const segment of segments) {
    if (node.kind !== 'directory') throw new Error(`${node.path} is not a directory`);
    const next = node.children.get(segment);
    if (!next) throw new Error(`missing ${segment}`);
    node = next;
  }
  if (node.kind !== 'directory') throw new Error(`${node.path} is not a directory`);
  return node;
}

describe('TreeAggregator', () => {
  it('rolls up emitted tokens and bytes bottom-up', () => {
    const root = new TreeAggregator().build(records);

    expect(root).toMatchObject({ name: '', path: '', depth: 0, aggregateTokens: 35, aggregateSize: 140, fileCount: 5 });
    expect(dir(root, 'src')).toMatchObject({ aggregateTokens: 25, aggregateSize: 100, fileCount: 3 });
    expect(dir(root, 'src', 'lib')).toMatchObject({
      name: 'lib',
      path: 'src/lib',
      depth: 2,
      aggregateTokens: 20,
      aggregateSize: 80,
      fileCount: 2,
    });
    expect(dir(root, 'docs')).toMatchObject({ aggregateTokens: 0, aggregateSize: 0, fileCount: 1 });
  });

  it('keeps every aggregate equal to the sum of its children', () => {
    const root = new TreeAggregator().build(records);
    for (const node of walkTree(root)) {
      if (node.kind !== 'directory') continue;
      let tokens = 0;
      for (const child of node.children.values()) {
        if (child.kind === 'directory') {
          tokens += child.aggregateTokens;
        } else if (child.record.status === 'Included' || child.record.status === 'Truncated') {
          tokens += child.record.tokenCount;
        }
      }
      expect(node.aggregateTokens).toBe(tokens);
    }
  });

  it('places skipped and dropped files in the tree', () => {
    const root = new TreeAggregator().build(records);
    const lib = dir(root, 'src', 'lib');
    expect(lib.children.get('big.bin')).toMatchObject({
      kind: 'file',
      path: 'src/lib/big.bin',
      depth: 3,
      record: { status: 'SkippedBinary' },
    });
    expect(dir(root, 'docs').children.get('guide.md')).toMatchObject({ record: { status: 'Dropped' } });
  });

  describe('ordering', () => {
    it('sorts by name with directories first by default', () => {
      expect(names(new TreeAggregator().build(records))).toEqual(['docs', 'src', 'README.md']);
    });

    it('puts files first when asked', () => {
      expect(names(new TreeAggregator({ dirsFirst: false }).build(records))).toEqual(['README.md', 'docs', 'src']);
    });

    it('sorts by tokens descending inside each partition', () => {
      const root = new TreeAggregator({ sortBy: 'tokens' }).build(records);
      expect(names(root)).toEqual(['src', 'docs', 'README.md']);
      expect(names(dir(root, 'src', 'lib'))).toEqual(['util.ts', 'big.bin']);
    });

    it('sorts by size descending', () => {
      const root = new TreeAggregator({ sortBy: 'size', dirsFirst: false }).build(records);
      expect(names(dir(root, 'src'))).toEqual(['index.ts', 'lib']);
      expect(names(dir(root, 'src', 'lib'))).toEqual(['util.ts', 'big.bin']);
    });

    it('weighs skipped and dropped files by emitted bytes only', () => {
      const mixed = [
        included('small.ts', 1, 10),
        skippedRecord({ relativePath: ['huge.bin'], sizeBytes: 10_000_000 }, 'SkippedTooLarge', 'too big'),
        dropRecord(included('dropped.md', 50, 5000)),
      ];
      const root = new TreeAggregator({ sortBy: 'size' }).build(mixed);
      expect(names(root)).toEqual(['small.ts', 'dropped.md', 'huge.bin']);
    });

    it('falls back to name order on ties', () => {
      const tied = [included('b.ts', 3, 1), included('a.ts', 3, 1), included('C.ts', 3, 1)];
      expect(names(new TreeAggregator({ sortBy: 'tokens' }).build(tied))).toEqual(['C.ts', 'a.ts', 'b.ts']);
    });
  });

  describe('depth limit', () => {
    it('collapses deep directories without changing totals', () => {
      const unlimited = new TreeAggregator().build(records);
      const limited = new TreeAggregator({ maxDepth: 1 }).build(records);

      expect(limited.aggregateTokens).toBe(unlimited.aggregateTokens);
      expect(names(limited)).toEqual(['docs', 'src', 'README.md']);
      expect(dir(limited, 'src')).toMatchObject({ collapsed: true, hiddenCount: 2, entries: [], aggregateTokens: 25 });
      expect(countNodes(limited)).toEqual({ directories: 2, files: 1 });
      expect(countNodes(unlimited)).toEqual({ directories: 3, files: 5 });
    });

    it('collapses the root itself at depth zero', () => {
      const root = new TreeAggregator({ maxDepth: 0 }).build(records);
      expect(root).toMatchObject({ collapsed: true, hiddenCount: 3, entries: [], aggregateTokens: 35 });
      expect(countNodes(root)).toEqual({ directories: 0, files: 0 });
    });
  });

  it('rejects paths that are both a file and a directory', () => {
    expect(() => new TreeAggregator().build([included('a', 1, 1), included('a/b', 1, 1)])).toThrow(
      new InvariantError('a is both a file and a directory'),
    );
    expect(() => new TreeAggregator().build([included('x.ts', 1, 1), included('x.ts', 1, 1)])).toThrow(
      'Duplicate tree entry for x.ts',
    );
  });

  it('builds an empty root from no records', () => {
    expect(new TreeAggregator().build([])).toMatchObject({ entries: [], aggregateTokens: 0, fileCount: 0 });
  });
});
