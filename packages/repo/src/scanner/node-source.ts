import fs from 'node:fs';
import path from 'node:path';
import { isWithin } from '@repodump/shared';
import type { EntryKind, FileSource, ResolvedEntry, SourceEntry } from './types';

/**
 * Synchronous `node:fs` access. Every read opens, reads and releases the
 * file before returning; no handle outlives a call.
 */
export class NodeFileSource implements FileSource {
  readonly root: string;

  constructor(rootPath: string) {
    this.root = fs.realpathSync(path.resolve(rootPath));
  }

  list(dir: readonly string[]): SourceEntry[] {
    return fs.readdirSync(this.abs(dir), { withFileTypes: true }).map((dirent) => ({
      name: dirent.name,
      kind: kindOf(dirent),
    }));
  }

  resolve(relativePath: readonly string[]): ResolvedEntry {
    const realPath = fs.realpathSync(this.abs(relativePath));
    const stats = fs.statSync(realPath);
    return {
      kind: stats.isDirectory() ? 'directory' : stats.isFile() ? 'file' : 'other',
      sizeBytes: stats.size,
      realPath,
      insideRoot: isWithin(this.root, realPath),
    };
  }

  read(relativePath: readonly string[]): Uint8Array {
    return fs.readFileSync(this.abs(relativePath));
  }

  private abs(relativePath: readonly string[]): string {
    return path.join(this.root, ...relativePath);
  }
}

function kindOf(dirent: fs.Dirent): EntryKind {
  if (dirent.isSymbolicLink()) return 'symlink';
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  return 'other';
}
