import { ValidationError } from "../../../shared/errors/InputErrors";
import { Protocol, WordRange, freezeProtocol } from "../../protocols/Protocol";

export const STUDY_LENGTHS = ["short", "medium", "long"] as const;
export type StudyLength = (typeof STUDY_LENGTHS)[number];

export const LANGUAGE_LEVELS = ["accessible", "standard", "advanced"] as const;
export type LanguageLevel = (typeof LANGUAGE_LEVELS)[number];

export type ToneCategory = "academic" | "balanced" | "devotional";

export interface LengthConstraints {
  readonly wordRange: WordRange;
  readonly maxTokens: number;
}

const LENGTH_CONSTRAINTS: Record<StudyLength, LengthConstraints> = {
  short: { wordRange: { min: 1000, max: 1500 }, maxTokens: 4000 },
  medium: { wordRange: { min: 2500, max: 3500 }, maxTokens: 8000 },
  long: { wordRange: { min: 5000, max: 7000 }, maxTokens: 16000 },
};

export interface StudyPreferencesInput {
  length?: string;
  toneLevel?: number;
  language?: string;
  focusAreas?: string;
}

/**
 * StudyPreferences Value Object
 *
 * Optional reader customizations. Unset fields leave the protocol's own
 * defaults in place.
 */
export class StudyPreferences {
  static readonly MIN_TONE = 0;
  static readonly MAX_TONE = 8;

  private constructor(
    public readonly length: StudyLength | undefined,
    public readonly toneLevel: number | undefined,
    public readonly language: LanguageLevel | undefined,
    public readonly focusAreas: string | undefined,
  ) {
    Object.freeze(this);
  }

  static create(input: StudyPreferencesInput = {}): StudyPreferences {
    const length =
      input.length === undefined
        ? undefined
        : StudyPreferences.oneOf(input.length, STUDY_LENGTHS, "length");
    const language =
      input.language === undefined
        ? undefined
        : StudyPreferences.oneOf(input.language, LANGUAGE_LEVELS, "language");

    if (
      input.toneLevel !== undefined &&
      (!Number.isInteger(input.toneLevel) ||
        input.toneLevel < StudyPreferences.MIN_TONE ||
        input.toneLevel > StudyPreferences.MAX_TONE)
    ) {
      throw new ValidationError(
        `Tone level must be a whole number between ${StudyPreferences.MIN_TONE} and ${StudyPreferences.MAX_TONE}`,
        "toneLevel",
      );
    }

    const focusAreas = input.focusAreas?.trim() || undefined;

    return new StudyPreferences(length, input.toneLevel, language, focusAreas);
  }

  private static oneOf<T extends string>(
    value: string,
    allowed: readonly T[],
    field: string,
  ): T {
    const match = allowed.find((option) => option === value.trim().toLowerCase());
    if (!match) {
      throw new ValidationError(
        `Invalid ${field}: ${value}. Must be one of: ${allowed.join(", ")}`,
        field,
      );
    }
    return match;
  }

  isEmpty(): boolean {
    return (
      this.length === undefined &&
      this.toneLevel === undefined &&
      this.language === undefined &&
      this.focusAreas === undefined
    );
  }

  toneCategory(): ToneCategory | undefined {
    if (this.toneLevel === undefined) return undefined;
    if (this.toneLevel <= 2) return "academic";
    if (this.toneLevel <= 5) return "balanced";
    return "devotional";
  }

  lengthConstraints(): LengthConstraints | undefined {
    return this.length ? LENGTH_CONSTRAINTS[this.length] : undefined;
  }

  toJSON(): Record<string, string | number> {
    const json: Record<string, string | number> = {};
    if (this.length !== undefined) json.length = this.length;
    if (this.toneLevel !== undefined) json.tone_level = this.toneLevel;
    if (this.language !== undefined) json.language = this.language;
    if (this.focusAreas !== undefined) json.focus_areas = this.focusAreas;
    return json;
  }
}

/**
 * The protocol with the preference's length contract swapped in. Returns the
 * protocol itself when no length preference is set.
 */
export function withLengthPreference(
  protocol: Protocol,
  preferences: StudyPreferences | undefined,
): Protocol {
  const constraints = preferences?.lengthConstraints();
  if (!constraints) {
    return protocol;
  }

  return freezeProtocol({
    ...protocol,
    wordRange: constraints.wordRange,
    maxTokens: constraints.maxTokens,
  });
}
