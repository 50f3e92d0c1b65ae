/**
 * Base application error class
 *
 * All custom errors extend this class so the CLI can report the failing
 * pipeline stage and error kind consistently.
 */

export type PipelineStage =
  | "input"
  | "config"
  | "resolve"
  | "render"
  | "generate"
  | "validate"
  | "persist"
  | "store";

export abstract class AppError extends Error {
  public readonly isOperational: boolean;
  public readonly timestamp: Date;

  constructor(
    message: string,
    public readonly code: string,
    public readonly stage: PipelineStage,
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.isOperational = isOperational;
    this.timestamp = new Date();

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stage: this.stage,
      timestamp: this.timestamp.toISOString(),
    };
  }
}
