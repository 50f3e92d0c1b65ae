import { AppError } from "./AppError";

/**
 * Errors raised before the pipeline starts: bad user input or a broken
 * environment.
 */

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, "VALIDATION_ERROR", "input");
    this.name = "ValidationError";
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR", "config");
    this.name = "ConfigurationError";
  }
}
