import { LOG_LEVEL_ORDER, type LogLevel, type Logger } from './types';

/**
 * The subset of `Console` the logger writes through.
 */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Defaults to the global console. The CLI passes a stderr-bound console. */
  sink?: LogSink;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.sink = options.sink ?? console;
  }

  debug(message: string): void {
    if (this.enabled('debug')) this.sink.debug(message);
  }

  info(message: string): void {
    if (this.enabled('info')) this.sink.info(message);
  }

  warn(message: string): void {
    if (this.enabled('warn')) this.sink.warn(message);
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    if (message) {
      this.sink.error(message, error);
    } else {
      this.sink.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }
}

/**
 * Discards everything. Default for library callers that pass no logger.
 */
export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  debug(message: string) {
    this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
