import { InvariantError } from '@repodump/shared';
import type {
  DroppedRecord,
  EmittedRecord,
  FileRecord,
  IncludedRecord,
  LifecycleStatus,
  SkipStatus,
  SkippedRecord,
  TruncatedRecord,
} from './types';

/** Appended to every truncated file body. Fixed text keeps re-estimation stable. */
export const TRUNCATION_MARKER = '\n... [truncated]';

const STAGE: Record<LifecycleStatus, number> = {
  Included: 0,
  Truncated: 1,
  Dropped: 2,
};

/**
 * Records only move forward: Included → Truncated → Dropped. A truncated
 * record may be truncated again; nothing moves back.
 * @throws InvariantError on any other transition
 */
export function assertForward(path: string, from: LifecycleStatus, to: LifecycleStatus): void {
  const forward = STAGE[to] > STAGE[from] || (from === 'Truncated' && to === 'Truncated');
  if (!forward) {
    throw new InvariantError(`Illegal status transition for ${path}: ${from} -> ${to}`);
  }
}

interface RecordIdentity {
  relativePath: readonly string[];
  sizeBytes: number;
}

export function includedRecord(
  identity: RecordIdentity,
  content: string,
  tokenCount: number,
  lossy = false,
): IncludedRecord {
  return {
    relativePath: [...identity.relativePath],
    path: identity.relativePath.join('/'),
    sizeBytes: identity.sizeBytes,
    status: 'Included',
    content,
    tokenCount,
    lossy,
  };
}

export function skippedRecord(
  identity: RecordIdentity,
  status: SkipStatus,
  reason: string,
): SkippedRecord {
  return {
    relativePath: [...identity.relativePath],
    path: identity.relativePath.join('/'),
    sizeBytes: identity.sizeBytes,
    status,
    tokenCount: 0,
    reason,
  };
}

/**
 * Replaces the body of an emitted record with a shorter one.
 * @param content - must already end with {@link TRUNCATION_MARKER}
 */
export function truncateRecord(
  record: EmittedRecord,
  content: string,
  tokenCount: number,
): TruncatedRecord {
  assertForward(record.path, record.status, 'Truncated');
  if (!content.endsWith(TRUNCATION_MARKER)) {
    throw new InvariantError(`Truncated content of ${record.path} lacks the truncation marker`);
  }
  if (tokenCount > record.tokenCount) {
    throw new InvariantError(
      `Truncating ${record.path} raised its token count (${record.tokenCount} -> ${tokenCount})`,
    );
  }
  return {
    relativePath: record.relativePath,
    path: record.path,
    sizeBytes: record.sizeBytes,
    status: 'Truncated',
    content,
    tokenCount,
    originalTokenCount: originalTokens(record),
    lossy: record.lossy,
  };
}

export function dropRecord(record: EmittedRecord): DroppedRecord {
  assertForward(record.path, record.status, 'Dropped');
  return {
    relativePath: record.relativePath,
    path: record.path,
    sizeBytes: record.sizeBytes,
    status: 'Dropped',
    tokenCount: 0,
    originalTokenCount: originalTokens(record),
  };
}

/** Token count the file had before any budget step touched it. */
export function originalTokens(record: FileRecord): number {
  switch (record.status) {
    case 'Included':
      return record.tokenCount;
    case 'Truncated':
    case 'Dropped':
      return record.originalTokenCount;
    default:
      return 0;
  }
}

/** The record body without the truncation marker. */
export function bodyOf(record: EmittedRecord): string {
  return record.status === 'Truncated'
    ? record.content.slice(0, record.content.length - TRUNCATION_MARKER.length)
    : record.content;
}
