import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  TraversalError,
  EncodingError,
  InvariantError,
  isUserError,
  toAppError,
  toWarning,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('TraversalError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('UnknownError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('subclasses', () => {
  it('ConfigError and UsageError are user errors', () => {
    const config = new ConfigError('bad');
    const usage = new UsageError('wrong');
    expect(config.code).toBe('ConfigError');
    expect(config.name).toBe('ConfigError');
    expect(usage.code).toBe('UsageError');
    expect(isUserError(config)).toBe(true);
    expect(isUserError(usage)).toBe(true);
    expect(isUserError(new InvariantError('x'))).toBe(false);
  });

  it('TraversalError carries the failing path', () => {
    const error = new TraversalError('src/locked.txt', 'permission denied');
    expect(error.code).toBe('TraversalError');
    expect(error.path).toBe('src/locked.txt');
    expect(error.message).toBe('permission denied');
  });

  it('EncodingError builds its message from path and encoding', () => {
    const error = new EncodingError('data.txt', 'utf-8');
    expect(error.message).toBe('Could not decode data.txt as utf-8');
    expect(error.encoding).toBe('utf-8');
  });
});

describe('toAppError', () => {
  it('keeps AppErrors unchanged', () => {
    const error = new UsageError('nope');
    expect(toAppError(error)).toBe(error);
  });

  it('wraps plain errors and values', () => {
    const plain = new Error('boom');
    const wrapped = toAppError(plain);
    expect(wrapped.code).toBe('UnknownError');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe(plain);
    expect(toAppError('text').message).toBe('text');
  });
});

describe('toWarning', () => {
  it('takes the path from path-carrying errors', () => {
    expect(toWarning(new TraversalError('a/b', 'denied'))).toEqual({
      code: 'TraversalError',
      message: 'denied',
      path: 'a/b',
    });
  });

  it('omits the path when none is known', () => {
    expect(toWarning(new AppError('BudgetInfeasible', 'too small'))).toEqual({
      code: 'BudgetInfeasible',
      message: 'too small',
    });
  });
});
