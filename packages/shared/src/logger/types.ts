/**
 * Severity threshold, lowest first. `silent` suppresses everything.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Interface for logging throughout repodump.
 *
 * @example
 * ```typescript
 * logger.info('Scanning ./src');
 * logger.error(new Error('Failed'), 'Could not write dump');
 *
 * // Create a child logger with additional context
 * const scoped = logger.child({ stage: 'collect' });
 * scoped.debug('skipped dist/app.js');
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, shown with --verbose) */
  debug(message: string): void;
  /** Log an informational message */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
