import pino from "pino";
import { ILogger, LogContext } from "./ILogger";

/**
 * Pino logger implementation
 *
 * Logs go to stderr: stdout carries the generated study.
 */
export class PinoLogger implements ILogger {
  private logger: pino.Logger;

  constructor(name = "lectionary", base?: pino.Logger) {
    this.logger = base ?? PinoLogger.createRoot(name);
  }

  private static createRoot(name: string): pino.Logger {
    const level = process.env.LOG_LEVEL || "info";

    return process.env.NODE_ENV !== "production"
      ? pino({
          name,
          level,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              destination: 2,
              ignore: "pid,hostname",
              translateTime: "SYS:standard",
            },
          },
        })
      : pino({ name, level }, pino.destination(2));
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.logger.error(
      {
        ...context,
        err: error,
      },
      message,
    );
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.logger.fatal(
      {
        ...context,
        err: error,
      },
      message,
    );
  }

  child(bindings: LogContext): ILogger {
    return new PinoLogger(undefined, this.logger.child(bindings));
  }
}
