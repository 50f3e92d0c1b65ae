/**
 * Protocol model
 *
 * A protocol is one interpretive framework: a system prompt, an input
 * template, and the structural contract a generated study must meet.
 * Protocols are plain frozen data; behavior lives in the prompt text.
 */

export const PROTOCOL_IDS = ["threshold", "palimpsest", "collision"] as const;

export type ProtocolId = (typeof PROTOCOL_IDS)[number];

export function isProtocolId(value: string): value is ProtocolId {
  return PROTOCOL_IDS.some((id) => id === value);
}

export interface WordRange {
  readonly min: number;
  readonly max: number;
}

export interface Protocol {
  readonly id: ProtocolId;
  readonly version: string;
  readonly displayName: string;
  readonly summary: string;
  /** Section labels in the order the study must present them */
  readonly requiredSections: readonly string[];
  readonly wordRange: WordRange;
  readonly tone: string;
  readonly maxTokens: number;
  readonly readingMinutes: string;
  readonly systemPrompt: string;
  readonly inputTemplate: string;
  readonly usesCollisionVectors: boolean;
}

export function freezeProtocol(protocol: Protocol): Protocol {
  return Object.freeze({
    ...protocol,
    requiredSections: Object.freeze([...protocol.requiredSections]),
    wordRange: Object.freeze({ ...protocol.wordRange }),
  });
}
