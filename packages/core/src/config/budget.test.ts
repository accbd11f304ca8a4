import { describe, it, expect } from 'vitest';
import { UsageError } from '@repodump/shared';
import { parseByteSize, parseTokenCount } from './budget';

describe('parseTokenCount', () => {
  it('should parse plain and suffixed counts', () => {
    expect(parseTokenCount('800')).toBe(800);
    expect(parseTokenCount('12k')).toBe(12_000);
    expect(parseTokenCount('1.5m')).toBe(1_500_000);
    expect(parseTokenCount(' 2K ')).toBe(2_000);
  });

  it('should throw on invalid format', () => {
    expect(() => parseTokenCount('lots')).toThrow(
      'Invalid token count: lots. Expected a number such as 800, 12k or 1.5m.',
    );
    expect(() => parseTokenCount('12kb')).toThrow(UsageError);
    expect(() => parseTokenCount('-5')).toThrow(UsageError);
  });

  it('should reject zero', () => {
    expect(() => parseTokenCount('0')).toThrow('Invalid token count: 0. It must be greater than zero.');
  });
});

describe('parseByteSize', () => {
  it('should parse 1024-based units', () => {
    expect(parseByteSize('100')).toBe(100);
    expect(parseByteSize('100b')).toBe(100);
    expect(parseByteSize('512kb')).toBe(524_288);
    expect(parseByteSize('2MB')).toBe(2_097_152);
    expect(parseByteSize('1.5k')).toBe(1536);
    expect(parseByteSize('1g')).toBe(1_073_741_824);
  });

  it('should throw on invalid values', () => {
    expect(() => parseByteSize('2 tb')).toThrow('Invalid byte size: 2 tb');
    expect(() => parseByteSize('0kb')).toThrow(UsageError);
  });
});
