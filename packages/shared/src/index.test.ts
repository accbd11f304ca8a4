import { describe, it, expect } from 'vitest';
import * as shared from './index';
import { name, ConfigError, ConsoleLogger, DumpConfigSchema, formatBytes } from './index';

describe('shared package', () => {
  it('exports name', () => {
    expect(name).toBe('@repodump/shared');
  });

  it('re-exports the public surface', () => {
    expect(new ConfigError('x')).toBeInstanceOf(Error);
    expect(new ConsoleLogger()).toBeDefined();
    expect(DumpConfigSchema.parse({}).encoding).toBe('utf-8');
    expect(formatBytes(10)).toBe('10 B');
  });

  it('exports logger classes but no shared logger instance', () => {
    expect(Object.keys(shared)).toEqual(expect.arrayContaining(['ConsoleLogger', 'NullLogger']));
    expect(Object.keys(shared)).not.toContain('logger');
  });
});
