/**
 * Error codes used throughout repodump.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'TraversalError'
  | 'EncodingError'
  | 'BudgetInfeasible'
  | 'InvariantError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all repodump errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ConfigError', 'Invalid glob', {
 *   details: { pattern: '[abc' },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid: bad glob patterns, conflicting
 * include/exclude sets, non-positive budgets. Always raised before traversal.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * A path could not be listed, resolved or read. Recovered per file by the
 * collector; never aborts a scan.
 */
export class TraversalError extends AppError {
  /** Scan-relative path that failed */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('TraversalError', message, options);
    this.path = path;
  }
}

/**
 * Bytes could not be decoded with the configured encoding.
 * Recovered with a lossy decode.
 */
export class EncodingError extends AppError {
  public readonly path: string;
  public readonly encoding: string;

  constructor(path: string, encoding: string, options: AppErrorOptions = {}) {
    super('EncodingError', `Could not decode ${path} as ${encoding}`, options);
    this.path = path;
    this.encoding = encoding;
  }
}

/**
 * An internal invariant was broken (a record moved backwards through its
 * status lifecycle, two records claimed the same path).
 */
export class InvariantError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InvariantError', message, options);
  }
}

/**
 * A recovered error, reported in the dump summary instead of aborting the run.
 */
export interface DumpWarning {
  code: ErrorCode;
  message: string;
  /** Scan-relative path the warning concerns, when there is one. */
  path?: string;
}

export function toWarning(error: AppError, path?: string): DumpWarning {
  const warning: DumpWarning = { code: error.code, message: error.message };
  const at = path ?? (error instanceof TraversalError || error instanceof EncodingError ? error.path : undefined);
  if (at !== undefined) warning.path = at;
  return warning;
}

/**
 * Whether the error is one the user can fix by changing flags or config.
 */
export function isUserError(error: unknown): error is ConfigError | UsageError {
  return error instanceof ConfigError || error instanceof UsageError;
}

/**
 * Wraps anything thrown into an AppError, keeping AppErrors as they are.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError('UnknownError', error.message, { cause: error });
  }
  return new AppError('UnknownError', String(error));
}
