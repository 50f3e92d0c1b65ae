/**
 * OpenAI Generation Backend
 *
 * Centralizes all OpenAI SDK interactions. SDK errors are rethrown
 * untouched: they carry the HTTP status the GenerationClient classifies.
 */

import OpenAI, { ClientOptions } from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import type { IConfig } from "../../shared/config/IConfig";
import type { ILogger } from "../logging/ILogger";
import type {
  BackendCompletion,
  BackendConstraints,
  BackendPrompt,
  IGenerationBackend,
} from "../../domain/studies/services/IGenerationBackend";
import type { FinishReason } from "../../domain/studies/entities/Generation";
import { ConfigurationError } from "../../shared/errors/InputErrors";

export interface CompletionRequestOptions {
  signal?: AbortSignal;
  maxRetries?: number;
}

/** The one SDK call the backend makes; `openai.chat.completions` satisfies it */
export interface ChatCompletionCreator {
  create(
    body: ChatCompletionCreateParamsNonStreaming,
    options?: CompletionRequestOptions,
  ): PromiseLike<ChatCompletion>;
}

/**
 * Build the SDK client, or null when no API key is configured so commands
 * that never generate still run.
 */
export function createOpenAIClient(
  config: IConfig,
  overrides: Partial<ClientOptions> = {},
): OpenAI | null {
  if (!config.hasApiKey()) {
    return null;
  }
  return new OpenAI({
    apiKey: config.openAiApiKey,
    baseURL: config.openAiBaseUrl,
    // retries would hide rate limits from the caller
    maxRetries: 0,
    ...overrides,
  });
}

function finishReasonOf(reason: string | null | undefined): FinishReason {
  if (reason === "stop") return "stop";
  if (reason === "length") return "length";
  return "other";
}

@injectable()
export class OpenAIGenerationBackend implements IGenerationBackend {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.ChatCompletions)
    private readonly completions: ChatCompletionCreator | null,
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ component: "OpenAIGenerationBackend" });
  }

  async generateText(
    prompt: BackendPrompt,
    constraints: BackendConstraints,
    signal: AbortSignal,
  ): Promise<BackendCompletion> {
    if (!this.completions) {
      throw new ConfigurationError(
        "OPENAI_API_KEY is not set. Add it to your environment or .env file.",
      );
    }

    this.logger.debug("Chat completion request", {
      model: this.config.openAiModel,
      maxTokens: constraints.maxTokens,
    });

    const completion = await this.completions.create(
      {
        model: this.config.openAiModel,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
        temperature: constraints.temperature,
        max_tokens: constraints.maxTokens,
      },
      { signal, maxRetries: 0 },
    );

    const choice = completion.choices[0];

    return {
      text: choice?.message?.content ?? "",
      finishReason: finishReasonOf(choice?.finish_reason),
      model: completion.model,
      usage: completion.usage && {
        promptTokens: completion.usage.prompt_tokens,
        completionTokens: completion.usage.completion_tokens,
      },
    };
  }
}
