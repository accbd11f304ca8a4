export type SkipStatus = 'SkippedTooLarge' | 'SkippedBinary' | 'SkippedExcluded' | 'SkippedUnreadable';

/** Statuses a record moves through while the budget is enforced. */
export type LifecycleStatus = 'Included' | 'Truncated' | 'Dropped';

export type FileStatus = LifecycleStatus | SkipStatus;

interface RecordBase {
  /** Path segments from the scan root; unique per record. */
  readonly relativePath: readonly string[];
  /** `relativePath` joined with `/`. */
  readonly path: string;
  /** Raw byte length on disk. */
  readonly sizeBytes: number;
}

export interface IncludedRecord extends RecordBase {
  readonly status: 'Included';
  readonly content: string;
  readonly tokenCount: number;
  /** True when the bytes were not valid in the configured encoding and were decoded lossily. */
  readonly lossy: boolean;
}

export interface TruncatedRecord extends RecordBase {
  readonly status: 'Truncated';
  /** Kept prefix followed by the truncation marker. */
  readonly content: string;
  readonly tokenCount: number;
  readonly originalTokenCount: number;
  readonly lossy: boolean;
}

export interface DroppedRecord extends RecordBase {
  readonly status: 'Dropped';
  readonly tokenCount: 0;
  readonly originalTokenCount: number;
}

export interface SkippedRecord extends RecordBase {
  readonly status: SkipStatus;
  readonly tokenCount: 0;
  /** Human-readable cause, e.g. the error message of an unreadable file. */
  readonly reason: string;
}

/** A record whose content is emitted in the dump. */
export type EmittedRecord = IncludedRecord | TruncatedRecord;

export type FileRecord = IncludedRecord | TruncatedRecord | DroppedRecord | SkippedRecord;

export const SKIP_STATUSES: readonly SkipStatus[] = [
  'SkippedTooLarge',
  'SkippedBinary',
  'SkippedExcluded',
  'SkippedUnreadable',
];

export function isEmitted(record: FileRecord): record is EmittedRecord {
  return record.status === 'Included' || record.status === 'Truncated';
}

export function isSkipped(record: FileRecord): record is SkippedRecord {
  return (SKIP_STATUSES as readonly string[]).includes(record.status);
}
