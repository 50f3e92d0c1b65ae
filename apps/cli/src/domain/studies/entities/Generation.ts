import { ProtocolId } from "../../protocols/Protocol";

export interface GenerationConstraints {
  readonly minWords: number;
  readonly maxWords: number;
  readonly maxTokens: number;
  readonly requiredSections: readonly string[];
}

/**
 * Rendered payload for one generation. Created per invocation and
 * discarded once the backend has answered.
 */
export interface GenerationRequest {
  /** Digest of the payload; identical inputs give identical ids */
  readonly correlationId: string;
  readonly protocolId: ProtocolId;
  readonly protocolVersion: string;
  readonly citation: string;
  readonly system: string;
  readonly prompt: string;
  readonly constraints: GenerationConstraints;
}

export type FinishReason = "stop" | "length" | "other";

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
}

export interface GenerationResult {
  readonly correlationId: string;
  readonly text: string;
  readonly wordCount: number;
  readonly finishReason: FinishReason;
  readonly model: string;
  readonly usage?: TokenUsage;
  readonly elapsedMs: number;
}
