import type { DumpWarning, Encoding, Logger } from '@repodump/shared';
import type { TokenEstimator } from '../tokens/estimator';
import type { FileRecord } from '../records/types';

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface SourceEntry {
  name: string;
  kind: EntryKind;
}

/**
 * What an entry turns out to be once symlinks are followed.
 */
export interface ResolvedEntry {
  kind: 'file' | 'directory' | 'other';
  sizeBytes: number;
  /** Canonical location; used to detect directory cycles. */
  realPath: string;
  /** False when a symlink leads outside the scan root. */
  insideRoot: boolean;
}

/**
 * Raw filesystem access for the collector. Paths are segment lists relative
 * to the scan root. Any method may throw; the collector recovers per entry.
 */
export interface FileSource {
  /** Human-readable root, used in headers and logs. */
  readonly root: string;
  list(dir: readonly string[]): SourceEntry[];
  resolve(path: readonly string[]): ResolvedEntry;
  read(path: readonly string[]): Uint8Array;
}

export interface CollectOptions {
  /** Files above this size become SkippedTooLarge without being read. */
  maxSizeBytes?: number;
  binaryStrict?: boolean;
  encoding?: Encoding;
  estimator?: TokenEstimator;
  logger?: Logger;
}

export interface CollectResult {
  /** One record per visited file, in walk order. */
  records: FileRecord[];
  warnings: DumpWarning[];
  /** Directories descended into, the root excluded. */
  directoryCount: number;
}
