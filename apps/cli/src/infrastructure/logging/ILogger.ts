/**
 * Logger interface
 *
 * Abstracts logging implementation so we can swap Pino for another logger.
 */

export type LogContext = Record<string, unknown>;

export interface ILogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  fatal(message: string, error?: Error, context?: LogContext): void;

  child(bindings: LogContext): ILogger;
}
