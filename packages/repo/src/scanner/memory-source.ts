import { fromSegments, toSegments } from '@repodump/shared';
import type { FileSource, ResolvedEntry, SourceEntry } from './types';

type MemoryNode =
  | { kind: 'file'; data: Uint8Array | Error }
  | { kind: 'directory'; children: Map<string, MemoryNode> }
  | { kind: 'symlink'; target: string };

type MemoryDirectory = Extract<MemoryNode, { kind: 'directory' }>;

/** File contents by path. An `Error` makes that file unreadable; a trailing `/` makes an empty directory. */
export type MemoryEntries = Record<string, string | Uint8Array | Error>;

/** Symlinks by path. Targets are root-relative; a target starting with `../` or `/` points outside the root. */
export type MemoryLinks = Record<string, string>;

const MAX_LINK_HOPS = 40;

interface Located {
  node: MemoryNode;
  real: string[];
}

/**
 * In-process stand-in for the filesystem, for tests and callers that already
 * hold file contents in memory.
 */
export class MemoryFileSource implements FileSource {
  readonly root: string;
  private readonly tree: MemoryDirectory = { kind: 'directory', children: new Map() };
  private readonly encoder = new TextEncoder();

  constructor(entries: MemoryEntries, links: MemoryLinks = {}, root = 'memory') {
    this.root = root;
    for (const [p, value] of Object.entries(entries)) {
      if (p.endsWith('/')) {
        this.ensureDirectory(toSegments(p));
        continue;
      }
      const data = typeof value === 'string' ? this.encoder.encode(value) : value;
      this.place(toSegments(p), { kind: 'file', data });
    }
    for (const [p, target] of Object.entries(links)) {
      this.place(toSegments(p), { kind: 'symlink', target });
    }
  }

  list(dir: readonly string[]): SourceEntry[] {
    const located = this.locate(dir);
    if (located === 'outside') {
      throw new Error(`EACCES: '${fromSegments(dir)}' is outside the root`);
    }
    const { node } = located;
    if (node.kind !== 'directory') {
      throw new Error(`ENOTDIR: not a directory, scandir '${fromSegments(dir)}'`);
    }
    return [...node.children.entries()].map(([name, child]) => ({ name, kind: child.kind }));
  }

  resolve(relativePath: readonly string[]): ResolvedEntry {
    const located = this.locate(relativePath);
    if (located === 'outside') {
      return { kind: 'file', sizeBytes: 0, realPath: '', insideRoot: false };
    }
    const { node, real } = located;
    return {
      kind: node.kind === 'directory' ? 'directory' : 'file',
      sizeBytes: node.kind === 'file' && !(node.data instanceof Error) ? node.data.byteLength : 0,
      realPath: `/${fromSegments(real)}`,
      insideRoot: true,
    };
  }

  read(relativePath: readonly string[]): Uint8Array {
    const located = this.locate(relativePath);
    const node = located === 'outside' ? undefined : located.node;
    if (node?.kind !== 'file') {
      throw new Error(`EISDIR: cannot read '${fromSegments(relativePath)}'`);
    }
    if (node.data instanceof Error) {
      throw node.data;
    }
    return node.data;
  }

  private locate(segments: readonly string[], hops = 0): Located | 'outside' {
    if (hops > MAX_LINK_HOPS) {
      throw new Error(`ELOOP: too many symbolic links, '${fromSegments(segments)}'`);
    }
    let node: MemoryNode = this.tree;
    let real: string[] = [];
    for (const segment of segments) {
      if (node.kind !== 'directory') {
        throw new Error(`ENOTDIR: '${fromSegments(segments)}'`);
      }
      const child = node.children.get(segment);
      if (!child) {
        throw new Error(`ENOENT: no such file or directory, '${fromSegments(segments)}'`);
      }
      if (child.kind === 'symlink') {
        if (child.target.startsWith('../') || child.target.startsWith('/')) {
          return 'outside';
        }
        const target = this.locate(toSegments(child.target), hops + 1);
        if (target === 'outside') return 'outside';
        node = target.node;
        real = target.real;
      } else {
        node = child;
        real = [...real, segment];
      }
    }
    return { node, real };
  }

  private ensureDirectory(segments: readonly string[]): MemoryDirectory {
    let dir = this.tree;
    for (const segment of segments) {
      const existing = dir.children.get(segment);
      if (existing && existing.kind !== 'directory') {
        throw new Error(`Path conflict at '${segment}' while building memory source`);
      }
      const next: MemoryDirectory = existing ?? { kind: 'directory', children: new Map() };
      dir.children.set(segment, next);
      dir = next;
    }
    return dir;
  }

  private place(segments: readonly string[], node: MemoryNode): void {
    const parent = this.ensureDirectory(segments.slice(0, -1));
    parent.children.set(segments[segments.length - 1], node);
  }
}
