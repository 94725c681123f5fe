/**
 * Severity tags accepted by the logging configuration.
 * `all` lets every entry through, `none` silences the logger.
 */
export type LogLevel =
  | 'all'
  | 'none'
  | 'debug'
  | 'message'
  | 'info'
  | 'warn'
  | 'error'
  | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = [
  'all',
  'none',
  'debug',
  'message',
  'info',
  'warn',
  'error',
  'fatal',
];

/**
 * Port interface for logging.
 * Filtering by severity is the implementation's job, never the caller's.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;

  /**
   * Published values coming from monitored items
   */
  message(message: string, data?: Record<string, unknown>): void;

  info(message: string, data?: Record<string, unknown>): void;

  warn(message: string, data?: Record<string, unknown>): void;

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Failures after which the client stops operating
   */
  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context
   */
  child(bindings: Record<string, unknown>): ILogger;
}
