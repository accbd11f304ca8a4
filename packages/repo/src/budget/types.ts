import type { DumpWarning } from '@repodump/shared';
import type { FileRecord } from '../records/types';

export interface Budget {
  /** Enforced by the collector, which never reads larger files. */
  readonly maxSizeBytes?: number;
  /** Hard cap on the summed token count of emitted records. */
  readonly maxTokens?: number;
}

export interface EnforcementResult {
  /** Same length and order as the input; only emitted records may change. */
  records: FileRecord[];
  /** Sum of `tokenCount` over Included and Truncated records. */
  totalTokens: number;
  /** Paths that ended up Truncated, in record order. */
  truncated: string[];
  /** Paths that ended up Dropped, in record order. */
  dropped: string[];
  warnings: DumpWarning[];
}
