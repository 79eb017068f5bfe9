/**
 * Log levels understood by the logger. `silent` disables output.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

/**
 * Port interface for logging
 * Components receive an ILogger and bind their own context through child()
 */
export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;

  debug(message: string, data?: Record<string, unknown>): void;

  info(message: string, data?: Record<string, unknown>): void;

  warn(message: string, data?: Record<string, unknown>): void;

  /**
   * Log at error level; `error` is attached as `err` when it is an Error
   */
  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context
   */
  child(bindings: Record<string, unknown>): ILogger;
}
