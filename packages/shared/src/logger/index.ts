export type { Logger, LogLevel } from './types';
export type { LogSink, ConsoleLoggerOptions } from './consoleLogger';
export { ConsoleLogger, NullLogger } from './consoleLogger';
