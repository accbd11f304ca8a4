import { describe, it, expect } from 'vitest';
import { describePatternProblem, parseIgnoreFile, patternRoot } from './patterns';

describe('describePatternProblem', () => {
  it('accepts ordinary globs', () => {
    expect(describePatternProblem('**/*.ts')).toBeUndefined();
    expect(describePatternProblem('src/[abc].js')).toBeUndefined();
    expect(describePatternProblem('\\[literal')).toBeUndefined();
  });

  it('reports empty, bare and unterminated patterns', () => {
    expect(describePatternProblem('   ')).toBe('pattern is empty');
    expect(describePatternProblem('!')).toBe('pattern "!" matches nothing');
    expect(describePatternProblem('a[b')).toBe('pattern "a[b" has an unterminated character class');
  });
});

describe('parseIgnoreFile', () => {
  it('drops comments and blanks and marks negations', () => {
    expect(parseIgnoreFile('# build output\n\ndist/\r\n!dist/keep.txt\n')).toEqual([
      { pattern: 'dist/', negated: false },
      { pattern: 'dist/keep.txt', negated: true },
    ]);
  });

  it('keeps escaped leading characters for the matcher', () => {
    expect(parseIgnoreFile('\\#notes\n\\!bang\n')).toEqual([
      { pattern: '\\#notes', negated: false },
      { pattern: '\\!bang', negated: false },
    ]);
  });

  it('trims unescaped trailing whitespace only', () => {
    expect(parseIgnoreFile('a.txt   \nb\\  \n')).toEqual([
      { pattern: 'a.txt', negated: false },
      { pattern: 'b\\ ', negated: false },
    ]);
  });

  it('skips lines it cannot use', () => {
    expect(parseIgnoreFile('[oops\nok\n')).toEqual([{ pattern: 'ok', negated: false }]);
  });
});

describe('patternRoot', () => {
  it('strips leading ./ and /', () => {
    expect(patternRoot('./.git/config')).toBe('.git/config');
    expect(patternRoot('/.svn')).toBe('.svn');
  });
});
