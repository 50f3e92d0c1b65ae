import { AppError } from "../../shared/errors/AppError";
import {
  BackendError,
  CancelledError,
  MissingSectionError,
} from "../../shared/errors/PipelineErrors";
import { ILogger } from "../../infrastructure/logging/ILogger";

export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export interface ErrorReport {
  exitCode: number;
  lines: string[];
}

/**
 * Map an error to the lines shown to the user and the process exit code.
 * Every report names the stage that failed and the error kind.
 */
export function describeError(error: unknown): ErrorReport {
  if (error instanceof CancelledError) {
    return {
      exitCode: EXIT_CANCELLED,
      lines: [`✗ [${error.stage}] ${error.name}: ${error.message}`],
    };
  }

  if (error instanceof BackendError) {
    return {
      exitCode: EXIT_FAILURE,
      lines: [
        `✗ [${error.stage}] ${error.name}: ${error.message}`,
        `  backend said: ${error.backendMessage}`,
      ],
    };
  }

  if (error instanceof MissingSectionError) {
    return {
      exitCode: EXIT_FAILURE,
      lines: [
        `✗ [${error.stage}] ${error.name}: ${error.message}`,
        "  The study was not saved.",
      ],
    };
  }

  if (error instanceof AppError) {
    return {
      exitCode: EXIT_FAILURE,
      lines: [`✗ [${error.stage}] ${error.name}: ${error.message}`],
    };
  }

  const name = error instanceof Error ? error.name : "Error";
  const message = error instanceof Error ? error.message : String(error);
  return {
    exitCode: EXIT_FAILURE,
    lines: [`✗ [internal] ${name}: ${message}`],
  };
}

/**
 * Centralized CLI error reporting
 *
 * Writes the report to stderr and logs anything that is not an expected,
 * operational failure with its stack.
 */
export class ErrorReporter {
  constructor(
    private readonly logger: ILogger,
    private readonly write: (line: string) => void,
  ) {}

  report(error: unknown): number {
    const { exitCode, lines } = describeError(error);

    if (error instanceof AppError && error.isOperational) {
      this.logger.debug("Command failed", error.toJSON());
    } else {
      this.logger.error(
        "Unexpected error",
        error instanceof Error ? error : undefined,
      );
    }

    for (const line of lines) {
      this.write(line);
    }
    return exitCode;
  }
}
