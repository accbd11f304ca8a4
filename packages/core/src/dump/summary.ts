import { hash } from 'ohash';
import type { DumpWarning } from '@repodump/shared';
import { isEmitted, type FileRecord, type SkipStatus } from '@repodump/repo';

export interface DumpSummary {
  /** Every record, whatever its status. */
  fileCount: number;
  directoryCount: number;
  includedCount: number;
  truncatedCount: number;
  droppedCount: number;
  skipped: Record<SkipStatus, number>;
  /** Tokens of Included and Truncated records. */
  totalTokens: number;
  /** On-disk bytes of Included and Truncated records. */
  totalBytes: number;
  maxTokens?: number;
  warnings: DumpWarning[];
  /** Stable hash of paths, statuses and token counts. */
  digest: string;
}

export interface SummaryInput {
  records: readonly FileRecord[];
  directoryCount: number;
  warnings: readonly DumpWarning[];
  maxTokens?: number;
}

export function summarize(input: SummaryInput): DumpSummary {
  const skipped: Record<SkipStatus, number> = {
    SkippedTooLarge: 0,
    SkippedBinary: 0,
    SkippedExcluded: 0,
    SkippedUnreadable: 0,
  };
  let includedCount = 0;
  let truncatedCount = 0;
  let droppedCount = 0;
  let totalTokens = 0;
  let totalBytes = 0;

  for (const record of input.records) {
    if (isEmitted(record)) {
      totalTokens += record.tokenCount;
      totalBytes += record.sizeBytes;
    }
    switch (record.status) {
      case 'Included':
        includedCount++;
        break;
      case 'Truncated':
        truncatedCount++;
        break;
      case 'Dropped':
        droppedCount++;
        break;
      default:
        skipped[record.status]++;
    }
  }

  const summary: DumpSummary = {
    fileCount: input.records.length,
    directoryCount: input.directoryCount,
    includedCount,
    truncatedCount,
    droppedCount,
    skipped,
    totalTokens,
    totalBytes,
    warnings: [...input.warnings],
    digest: hash(input.records.map((r) => [r.path, r.status, r.tokenCount])),
  };
  if (input.maxTokens !== undefined) {
    summary.maxTokens = input.maxTokens;
  }
  return summary;
}
