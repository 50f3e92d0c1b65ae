import { FinishReason, TokenUsage } from "../entities/Generation";

export interface BackendPrompt {
  system: string;
  user: string;
}

export interface BackendConstraints {
  maxTokens: number;
  temperature: number;
}

export interface BackendCompletion {
  text: string;
  finishReason: FinishReason;
  model: string;
  usage?: TokenUsage;
}

/**
 * Text-generation capability
 *
 * Implementations reject with whatever their transport throws; errors that
 * carry a numeric `status` are classified by the GenerationClient.
 * Swap in a stub for tests.
 */
export interface IGenerationBackend {
  generateText(
    prompt: BackendPrompt,
    constraints: BackendConstraints,
    signal: AbortSignal,
  ): Promise<BackendCompletion>;
}
