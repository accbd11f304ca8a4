import { describe, it, expect } from 'vitest';
import { DumpConfigSchema, DEFAULT_MAX_SIZE_BYTES } from './schema';

describe('DumpConfigSchema', () => {
  it('fills every default from an empty object', () => {
    const config = DumpConfigSchema.parse({});
    expect(config).toEqual({
      include: [],
      exclude: [],
      gitignore: true,
      defaultExcludes: true,
      binaryStrict: true,
      encoding: 'utf-8',
      budget: { maxSizeBytes: DEFAULT_MAX_SIZE_BYTES },
      tokenizer: { strategy: 'chars', charsPerToken: 4 },
      tree: { enabled: true, showTokens: true, showSize: false, sortBy: 'name', dirsFirst: true },
      output: { format: 'text', stdout: true },
    });
  });

  it('fills nested defaults when a section is partially given', () => {
    const config = DumpConfigSchema.parse({ tree: { sortBy: 'tokens', maxDepth: 2 } });
    expect(config.tree).toEqual({
      enabled: true,
      maxDepth: 2,
      showTokens: true,
      showSize: false,
      sortBy: 'tokens',
      dirsFirst: true,
    });
  });

  it('keeps the default size cap when only a token cap is given', () => {
    expect(DumpConfigSchema.parse({ budget: { maxTokens: 500 } }).budget).toEqual({
      maxSizeBytes: DEFAULT_MAX_SIZE_BYTES,
      maxTokens: 500,
    });
  });

  it('rejects non-positive budgets', () => {
    const result = DumpConfigSchema.safeParse({ budget: { maxTokens: 0 } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['budget', 'maxTokens']);
    }
    expect(DumpConfigSchema.safeParse({ budget: { maxSizeBytes: -1 } }).success).toBe(false);
  });

  it('rejects unknown enum values', () => {
    expect(DumpConfigSchema.safeParse({ tree: { sortBy: 'date' } }).success).toBe(false);
    expect(DumpConfigSchema.safeParse({ output: { format: 'xml' } }).success).toBe(false);
    expect(DumpConfigSchema.safeParse({ encoding: 'ebcdic' }).success).toBe(false);
  });

  it('flags a pattern that is both included and excluded', () => {
    const result = DumpConfigSchema.safeParse({ include: ['src/'], exclude: ['src/'] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('pattern "src/" is both included and excluded');
    }
  });
});
