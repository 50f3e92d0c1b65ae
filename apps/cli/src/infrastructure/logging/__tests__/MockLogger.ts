import { ILogger, LogContext } from "../ILogger";

interface LogCall {
  message: string;
  context?: LogContext;
}

interface ErrorLogCall extends LogCall {
  error?: Error;
}

/**
 * Mock logger for testing
 *
 * Captures all log calls for assertion in tests. Child loggers record into
 * the same arrays.
 */
export class MockLogger implements ILogger {
  public debugCalls: LogCall[] = [];
  public infoCalls: LogCall[] = [];
  public warnCalls: LogCall[] = [];
  public errorCalls: ErrorLogCall[] = [];
  public fatalCalls: ErrorLogCall[] = [];

  debug(message: string, context?: LogContext): void {
    this.debugCalls.push({ message, context });
  }

  info(message: string, context?: LogContext): void {
    this.infoCalls.push({ message, context });
  }

  warn(message: string, context?: LogContext): void {
    this.warnCalls.push({ message, context });
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.errorCalls.push({ message, error, context });
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.fatalCalls.push({ message, error, context });
  }

  child(_bindings: LogContext): ILogger {
    return this;
  }

  messages(level: "debug" | "info" | "warn" | "error" | "fatal"): string[] {
    const calls: LogCall[] = {
      debug: this.debugCalls,
      info: this.infoCalls,
      warn: this.warnCalls,
      error: this.errorCalls,
      fatal: this.fatalCalls,
    }[level];
    return calls.map((call) => call.message);
  }

  clear(): void {
    this.debugCalls = [];
    this.infoCalls = [];
    this.warnCalls = [];
    this.errorCalls = [];
    this.fatalCalls = [];
  }
}
