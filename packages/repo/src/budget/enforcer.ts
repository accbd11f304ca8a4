import { AppError, InvariantError, NullLogger, compareSegments, toWarning, type DumpWarning, type Logger } from '@repodump/shared';
import { CharRatioEstimator, type TokenEstimator } from '../tokens/estimator';
import { TRUNCATION_MARKER, bodyOf, dropRecord, truncateRecord } from '../records/status';
import { isEmitted, type EmittedRecord, type FileRecord } from '../records/types';
import type { Budget, EnforcementResult } from './types';

/**
 * Brings the emitted token total under `maxTokens` by shrinking the largest
 * contributors first, so that as many small files as possible survive whole.
 *
 * Each step takes the emitted record with the highest current count (ties by
 * path) and truncates it to exactly absorb the excess, or drops it when even
 * a one-character stub would not fit.
 */
export class BudgetEnforcer {
  private readonly logger: Logger;

  constructor(
    private readonly estimator: TokenEstimator = new CharRatioEstimator(),
    logger: Logger = new NullLogger(),
  ) {
    this.logger = logger.child({ stage: 'budget' });
  }

  enforce(input: readonly FileRecord[], budget: Budget = {}): EnforcementResult {
    const records = [...input];
    const warnings: DumpWarning[] = [];
    const { maxTokens } = budget;
    let total = sumEmitted(records);

    if (maxTokens !== undefined) {
      const infeasible = this.checkFeasible(records, maxTokens);
      if (infeasible) {
        warnings.push(toWarning(infeasible));
        this.logger.warn(infeasible.message);
      }

      while (total > maxTokens) {
        const index = largestEmitted(records);
        if (index < 0) break;

        const record = records[index];
        if (!isEmitted(record)) break;
        const target = record.tokenCount - (total - maxTokens);
        const next = this.shrink(record, target);

        this.logger.debug(`${next.status.toLowerCase()} ${record.path}: ${record.tokenCount} -> ${next.tokenCount} tokens`);
        total += next.tokenCount - record.tokenCount;
        records[index] = next;
      }
    }

    const totalTokens = sumEmitted(records);
    if (totalTokens !== total) {
      throw new InvariantError(`Token total drifted during enforcement (${total} != ${totalTokens})`);
    }

    return {
      records,
      totalTokens,
      truncated: records.filter((r) => r.status === 'Truncated').map((r) => r.path),
      dropped: records.filter((r) => r.status === 'Dropped').map((r) => r.path),
      warnings,
    };
  }

  /**
   * Truncates `record` to the longest prefix whose marked body fits in
   * `target` tokens, or drops it if no non-empty prefix does.
   */
  private shrink(record: EmittedRecord, target: number): FileRecord {
    const body = bodyOf(record);
    const fits = (length: number) => this.estimator.estimate(body.slice(0, length) + TRUNCATION_MARKER) <= target;

    if (body.length < 2 || !fits(1)) {
      return dropRecord(record);
    }

    // Largest length in [1, body.length - 1] that fits; the full body never does.
    let low = 1;
    let high = body.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (fits(mid)) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    let length = low;
    if (isHighSurrogate(body.charCodeAt(length - 1))) {
      length--;
    }
    if (length === 0) {
      return dropRecord(record);
    }

    const content = body.slice(0, length) + TRUNCATION_MARKER;
    return truncateRecord(record, content, this.estimator.estimate(content));
  }

  private checkFeasible(records: readonly FileRecord[], maxTokens: number): AppError | undefined {
    let smallest: EmittedRecord | undefined;
    for (const record of records) {
      if (!isEmitted(record) || record.tokenCount === 0) continue;
      if (!smallest || record.tokenCount < smallest.tokenCount) smallest = record;
    }
    if (smallest && maxTokens < smallest.tokenCount) {
      return new AppError(
        'BudgetInfeasible',
        `Token budget ${maxTokens} is smaller than the smallest file (${smallest.path}, ${smallest.tokenCount} tokens)`,
        { details: { maxTokens, path: smallest.path, tokens: smallest.tokenCount } },
      );
    }
    return undefined;
  }
}

function sumEmitted(records: readonly FileRecord[]): number {
  let total = 0;
  for (const record of records) {
    if (isEmitted(record)) total += record.tokenCount;
  }
  return total;
}

function largestEmitted(records: readonly FileRecord[]): number {
  let best = -1;
  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    if (!isEmitted(record) || record.tokenCount === 0) continue;
    if (best < 0) {
      best = i;
      continue;
    }
    const current = records[best];
    if (
      record.tokenCount > current.tokenCount ||
      (record.tokenCount === current.tokenCount && compareSegments(record.relativePath, current.relativePath) < 0)
    ) {
      best = i;
    }
  }
  return best;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
