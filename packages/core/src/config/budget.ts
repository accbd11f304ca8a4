import { UsageError } from '@repodump/shared';

const TOKEN_UNITS: Record<string, number> = {
  '': 1,
  k: 1_000,
  m: 1_000_000,
  b: 1_000_000_000,
};

const BYTE_UNITS: Record<string, number> = {
  '': 1,
  b: 1,
  k: 1024,
  kb: 1024,
  m: 1024 ** 2,
  mb: 1024 ** 2,
  g: 1024 ** 3,
  gb: 1024 ** 3,
};

/**
 * Parses `--max-tokens` values such as `800`, `12k` or `1.5m`.
 * @throws UsageError for malformed or non-positive input
 */
export function parseTokenCount(input: string): number {
  return parseScaled(input, TOKEN_UNITS, 'token count', '800, 12k or 1.5m');
}

/**
 * Parses `--max-size` values such as `100`, `512kb` or `2mb` (1024 based).
 * @throws UsageError for malformed or non-positive input
 */
export function parseByteSize(input: string): number {
  return parseScaled(input, BYTE_UNITS, 'byte size', '100, 512kb or 2mb');
}

function parseScaled(input: string, units: Record<string, number>, what: string, examples: string): number {
  const match = input.trim().toLowerCase().match(/^(\d+(?:\.\d+)?)\s*([a-z]*)$/);
  if (!match || !Object.hasOwn(units, match[2])) {
    throw new UsageError(`Invalid ${what}: ${input}. Expected a number such as ${examples}.`);
  }

  const value = Math.round(parseFloat(match[1]) * units[match[2]]);
  if (value <= 0) {
    throw new UsageError(`Invalid ${what}: ${input}. It must be greater than zero.`);
  }
  return value;
}
