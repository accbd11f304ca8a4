import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, the separator used in every
 * scan-relative path repodump emits.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Splits a scan-relative path into its segments, dropping empty and `.` parts.
 */
export function toSegments(p: string): string[] {
  return normalizePath(p)
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.');
}

/**
 * Joins segments back into a forward-slash relative path.
 */
export function fromSegments(segments: readonly string[]): string {
  return segments.join('/');
}

/**
 * Whether `child` is `parent` itself or lies somewhere below it.
 * Both must be absolute paths.
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/**
 * Code-unit comparison. Unlike `localeCompare` it gives the same order on
 * every machine, which keeps dumps byte-identical.
 */
export function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Orders relative paths segment by segment, a path before anything below it.
 * Matches the order of a depth-first walk, which `a/b` vs `a.b` string
 * comparison does not.
 */
export function compareSegments(a: readonly string[], b: readonly string[]): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const order = compareNames(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}
