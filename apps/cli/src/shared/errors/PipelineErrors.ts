import { AppError } from "./AppError";

/**
 * Study pipeline errors
 *
 * One class per failure kind, grouped by the stage that raises it.
 */

// resolve

export class ReferenceNotFoundError extends AppError {
  constructor(
    public readonly citation: string,
    detail?: string,
  ) {
    super(
      detail
        ? `No text found for "${citation}": ${detail}`
        : `No text found for "${citation}"`,
      "REFERENCE_NOT_FOUND",
      "resolve",
    );
    this.name = "ReferenceNotFound";
  }
}

export class SourceUnavailableError extends AppError {
  constructor(
    public readonly source: string,
    detail: string,
  ) {
    super(`${source} is unavailable: ${detail}`, "SOURCE_UNAVAILABLE", "resolve");
    this.name = "SourceUnavailable";
  }
}

// render

export class UnknownProtocolError extends AppError {
  constructor(
    public readonly protocolId: string,
    known: readonly string[],
  ) {
    super(
      `Unknown protocol "${protocolId}". Choose from: ${known.join(", ")}`,
      "UNKNOWN_PROTOCOL",
      "render",
    );
    this.name = "UnknownProtocol";
  }
}

export class TemplateError extends AppError {
  constructor(
    public readonly protocolId: string,
    detail: string,
  ) {
    super(
      `Protocol "${protocolId}" is misconfigured: ${detail}`,
      "TEMPLATE_ERROR",
      "render",
      false,
    );
    this.name = "TemplateError";
  }
}

// generate

export abstract class BackendError extends AppError {
  constructor(
    message: string,
    code: string,
    public readonly backendMessage: string,
  ) {
    super(message, code, "generate");
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      backendMessage: this.backendMessage,
    };
  }
}

export class BackendTimeoutError extends BackendError {
  constructor(public readonly timeoutMs: number) {
    super(
      `Generation backend did not respond within ${timeoutMs}ms`,
      "BACKEND_TIMEOUT",
      `timed out after ${timeoutMs}ms`,
    );
    this.name = "BackendTimeout";
  }
}

export class BackendAuthError extends BackendError {
  constructor(backendMessage: string) {
    super(
      "Generation backend rejected the credentials",
      "BACKEND_AUTH_ERROR",
      backendMessage,
    );
    this.name = "BackendAuthError";
  }
}

export class BackendRateLimitedError extends BackendError {
  constructor(backendMessage: string) {
    super(
      "Generation backend rate limit reached",
      "BACKEND_RATE_LIMITED",
      backendMessage,
    );
    this.name = "BackendRateLimited";
  }
}

export class BackendRejectedError extends BackendError {
  constructor(backendMessage: string) {
    super(
      "Generation backend rejected the request",
      "BACKEND_REJECTED",
      backendMessage,
    );
    this.name = "BackendRejected";
  }
}

export class BackendUnavailableError extends BackendError {
  constructor(backendMessage: string) {
    super(
      "Generation backend is unavailable",
      "BACKEND_UNAVAILABLE",
      backendMessage,
    );
    this.name = "BackendUnavailable";
  }
}

export class CancelledError extends BackendError {
  constructor() {
    super("Generation was cancelled", "CANCELLED", "aborted by caller");
    this.name = "Cancelled";
  }
}

// validate

export class MissingSectionError extends AppError {
  constructor(
    public readonly protocolId: string,
    public readonly missing: readonly string[],
    public readonly outOfOrder: readonly string[],
  ) {
    super(
      MissingSectionError.describe(missing, outOfOrder),
      "MISSING_SECTION",
      "validate",
    );
    this.name = "MissingSection";
  }

  private static describe(
    missing: readonly string[],
    outOfOrder: readonly string[],
  ): string {
    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`missing ${missing.join(", ")}`);
    }
    if (outOfOrder.length > 0) {
      parts.push(`out of order ${outOfOrder.join(", ")}`);
    }
    return `Study does not follow the required section structure (${parts.join("; ")})`;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      protocolId: this.protocolId,
      missing: this.missing,
      outOfOrder: this.outOfOrder,
    };
  }
}

// persist / store

export class PersistenceError extends AppError {
  constructor(
    message: string,
    public readonly underlying?: unknown,
  ) {
    super(message, "PERSISTENCE_ERROR", "persist");
    this.name = "PersistenceError";
  }
}

export class ArtifactNotFoundError extends AppError {
  constructor(public readonly slugOrPath: string) {
    super(`Study "${slugOrPath}" not found`, "ARTIFACT_NOT_FOUND", "store");
    this.name = "ArtifactNotFound";
  }
}
