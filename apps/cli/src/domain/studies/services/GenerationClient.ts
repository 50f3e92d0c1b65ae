import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import type { IConfig } from "../../../shared/config/IConfig";
import type { ILogger } from "../../../infrastructure/logging/ILogger";
import type { IGenerationBackend } from "./IGenerationBackend";
import { GenerationRequest, GenerationResult } from "../entities/Generation";
import { AppError } from "../../../shared/errors/AppError";
import {
  BackendAuthError,
  BackendError,
  BackendRateLimitedError,
  BackendRejectedError,
  BackendTimeoutError,
  BackendUnavailableError,
  CancelledError,
} from "../../../shared/errors/PipelineErrors";
import { errorMessage } from "../../../shared/errors/errorMessage";
import { countWords } from "../wordCount";

export interface GenerateOptions {
  /** Caller cancellation, e.g. Ctrl-C */
  signal?: AbortSignal;
  /** Overrides the configured GENERATION_TIMEOUT_MS */
  timeoutMs?: number;
}

const TEMPERATURE = 0.7;

function statusOf(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return error.status;
  }
  return undefined;
}

/**
 * Map a transport failure onto the backend error taxonomy by its HTTP
 * status. Failures without a status never reached the service.
 */
export function classifyBackendError(error: unknown): BackendError {
  const status = statusOf(error);
  const message = errorMessage(error);

  if (status === 401 || status === 403) return new BackendAuthError(message);
  if (status === 429) return new BackendRateLimitedError(message);
  if (status !== undefined && status >= 400 && status < 500) {
    return new BackendRejectedError(message);
  }
  return new BackendUnavailableError(message);
}

/**
 * Generation Client
 *
 * Sends one rendered request to the backend and waits for the full
 * completion under a deadline. No retries: a rate-limited or failed call is
 * reported to the caller as is.
 */
@injectable()
export class GenerationClient {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.GenerationBackend) private readonly backend: IGenerationBackend,
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ component: "GenerationClient" });
  }

  async generate(
    request: GenerationRequest,
    options: GenerateOptions = {},
  ): Promise<GenerationResult> {
    const timeoutMs = options.timeoutMs ?? this.config.generationTimeoutMs;
    const external = options.signal;

    if (external?.aborted) {
      throw new CancelledError();
    }

    const controller = new AbortController();
    let timedOut = false;

    const onExternalAbort = (): void => controller.abort();
    external?.addEventListener("abort", onExternalAbort, { once: true });

    // Settles only on abort, so a backend that ignores the signal still loses the race
    const interrupted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        "abort",
        () =>
          reject(timedOut ? new BackendTimeoutError(timeoutMs) : new CancelledError()),
        { once: true },
      );
    });

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const started = Date.now();
    this.logger.info("Requesting study generation", {
      correlationId: request.correlationId,
      protocol: request.protocolId,
      citation: request.citation,
      timeoutMs,
    });

    try {
      const completion = await Promise.race([
        this.backend.generateText(
          { system: request.system, user: request.prompt },
          { maxTokens: request.constraints.maxTokens, temperature: TEMPERATURE },
          controller.signal,
        ),
        interrupted,
      ]);

      const text = completion.text.trim();
      if (text === "") {
        throw new BackendRejectedError("backend returned an empty completion");
      }

      const result: GenerationResult = {
        correlationId: request.correlationId,
        text,
        wordCount: countWords(text),
        finishReason: completion.finishReason,
        model: completion.model,
        usage: completion.usage,
        elapsedMs: Date.now() - started,
      };

      if (result.finishReason === "length") {
        this.logger.warn("Completion stopped at the token limit", {
          correlationId: request.correlationId,
          maxTokens: request.constraints.maxTokens,
          wordCount: result.wordCount,
        });
      }

      this.logger.info("Generation complete", {
        correlationId: request.correlationId,
        model: result.model,
        wordCount: result.wordCount,
        elapsedMs: result.elapsedMs,
      });

      return result;
    } catch (error) {
      const failure = this.classify(error, timedOut, timeoutMs, external);
      this.logger.warn("Generation failed", {
        correlationId: request.correlationId,
        error: failure.name,
        elapsedMs: Date.now() - started,
      });
      throw failure;
    } finally {
      clearTimeout(timer);
      external?.removeEventListener("abort", onExternalAbort);
    }
  }

  private classify(
    error: unknown,
    timedOut: boolean,
    timeoutMs: number,
    external: AbortSignal | undefined,
  ): AppError {
    if (timedOut) {
      return error instanceof BackendTimeoutError
        ? error
        : new BackendTimeoutError(timeoutMs);
    }
    if (external?.aborted) {
      return error instanceof CancelledError ? error : new CancelledError();
    }
    if (error instanceof AppError) {
      return error;
    }
    return classifyBackendError(error);
  }
}
