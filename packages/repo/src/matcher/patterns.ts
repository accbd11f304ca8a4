import { ConfigError } from '@repodump/shared';

/**
 * One line of a `.gitignore`, after comments and blanks are stripped.
 */
export interface IgnoreLine {
  pattern: string;
  negated: boolean;
}

/**
 * Returns a description of what is wrong with a glob, or undefined when it is usable.
 */
export function describePatternProblem(pattern: string): string | undefined {
  const body = pattern.trim();
  if (body === '') {
    return 'pattern is empty';
  }
  if (body === '!' || body === '/') {
    return `pattern "${pattern}" matches nothing`;
  }

  let open = false;
  for (let i = 0; i < body.length; i++) {
    const c = body[i];
    if (c === '\\') {
      i++;
      continue;
    }
    if (c === '[' && !open) {
      open = true;
      // A `]` right after `[` or `[!` is a literal member of the class.
      if (body[i + 1] === '!' || body[i + 1] === '^') i++;
      if (body[i + 1] === ']') i++;
    } else if (c === ']' && open) {
      open = false;
    }
  }
  if (open) {
    return `pattern "${pattern}" has an unterminated character class`;
  }
  return undefined;
}

export function assertValidPatterns(patterns: readonly string[], kind: 'include' | 'exclude'): void {
  for (const pattern of patterns) {
    const problem = describePatternProblem(pattern);
    if (problem) {
      throw new ConfigError(`Invalid ${kind} glob: ${problem}`, { details: { pattern } });
    }
  }
}

/**
 * Parses `.gitignore` text into ordered lines. Unusable lines are dropped,
 * as git itself does.
 */
export function parseIgnoreFile(text: string): IgnoreLine[] {
  const lines: IgnoreLine[] = [];
  for (const raw of text.split(/\r?\n/)) {
    let line = raw.replace(/(?<!\\)\s+$/, '');
    if (!line || line.startsWith('#')) continue;

    let negated = false;
    if (line.startsWith('!')) {
      negated = true;
      line = line.slice(1);
    }

    if (describePatternProblem(line)) continue;
    lines.push({ pattern: line, negated });
  }
  return lines;
}

/**
 * Drops a leading `./` from a user glob; `ignore` would read it as part of a name.
 */
export function normalizeGlob(pattern: string): string {
  return pattern.replace(/^(\.\/)+/, '');
}

/**
 * Strips `./` and leading slashes so a user glob can be compared to a path root.
 */
export function patternRoot(pattern: string): string {
  return pattern.replace(/^(\.\/|\/)+/, '');
}
