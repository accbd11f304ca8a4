import { describe, it, expect } from 'vitest';
import { InvariantError } from '@repodump/shared';
import {
  TRUNCATION_MARKER,
  assertForward,
  bodyOf,
  dropRecord,
  includedRecord,
  originalTokens,
  skippedRecord,
  truncateRecord,
} from './status';
import { isEmitted, isSkipped } from './types';

const identity = { relativePath: ['src', 'big.ts'], sizeBytes: 400 };

describe('record lifecycle', () => {
  it('builds an included record with a joined path', () => {
    const record = includedRecord(identity, 'x'.repeat(400), 100);
    expect(record).toEqual({
      relativePath: ['src', 'big.ts'],
      path: 'src/big.ts',
      sizeBytes: 400,
      status: 'Included',
      content: 'x'.repeat(400),
      tokenCount: 100,
      lossy: false,
    });
    expect(isEmitted(record)).toBe(true);
  });

  it('truncates forward and remembers the original count', () => {
    const record = includedRecord(identity, 'abcdefgh', 100);
    const truncated = truncateRecord(record, `abc${TRUNCATION_MARKER}`, 5);

    expect(truncated.status).toBe('Truncated');
    expect(truncated.tokenCount).toBe(5);
    expect(truncated.originalTokenCount).toBe(100);
    expect(bodyOf(truncated)).toBe('abc');

    const again = truncateRecord(truncated, `a${TRUNCATION_MARKER}`, 4);
    expect(again.originalTokenCount).toBe(100);
  });

  it('drops emitted records with no content', () => {
    const truncated = truncateRecord(includedRecord(identity, 'abc', 50), `a${TRUNCATION_MARKER}`, 5);
    const dropped = dropRecord(truncated);
    expect(dropped).toEqual({
      relativePath: ['src', 'big.ts'],
      path: 'src/big.ts',
      sizeBytes: 400,
      status: 'Dropped',
      tokenCount: 0,
      originalTokenCount: 50,
    });
    expect(isEmitted(dropped)).toBe(false);
    expect(originalTokens(dropped)).toBe(50);
  });

  it('refuses truncated content without the marker or with more tokens', () => {
    const record = includedRecord(identity, 'abc', 10);
    expect(() => truncateRecord(record, 'ab', 1)).toThrow(InvariantError);
    expect(() => truncateRecord(record, `ab${TRUNCATION_MARKER}`, 11)).toThrow(
      'Truncating src/big.ts raised its token count (10 -> 11)',
    );
  });

  it('only allows forward transitions', () => {
    expect(() => assertForward('a', 'Included', 'Truncated')).not.toThrow();
    expect(() => assertForward('a', 'Truncated', 'Truncated')).not.toThrow();
    expect(() => assertForward('a', 'Included', 'Dropped')).not.toThrow();
    expect(() => assertForward('a', 'Truncated', 'Included')).toThrow(
      'Illegal status transition for a: Truncated -> Included',
    );
    expect(() => assertForward('a', 'Dropped', 'Truncated')).toThrow(InvariantError);
    expect(() => assertForward('a', 'Included', 'Included')).toThrow(InvariantError);
  });

  it('skipped records carry a reason and no tokens', () => {
    const record = skippedRecord({ relativePath: ['logo.png'], sizeBytes: 12 }, 'SkippedBinary', 'binary content');
    expect(record.tokenCount).toBe(0);
    expect(isSkipped(record)).toBe(true);
    expect(isEmitted(record)).toBe(false);
    expect(originalTokens(record)).toBe(0);
  });
});
