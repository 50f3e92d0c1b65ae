import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import type { IConfig } from "../../../shared/config/IConfig";
import { Protocol, WordRange } from "../../protocols/Protocol";
import { GenerationResult } from "../entities/Generation";
import { MissingSectionError } from "../../../shared/errors/PipelineErrors";
import { countWords } from "../wordCount";
import { labelPattern, stripLeadingTitle } from "./StudyDocument";

/** Soft failure: the study is kept but flagged */
export interface LengthOutOfRange {
  readonly kind: "LengthOutOfRange";
  readonly wordCount: number;
  readonly allowed: WordRange;
  readonly nominal: WordRange;
}

export interface ValidatedText {
  /** Study body with any model-added title removed; what gets persisted */
  readonly text: string;
  readonly wordCount: number;
  readonly lengthWarning?: LengthOutOfRange;
}

export type ValidationVerdict =
  | { readonly ok: true; readonly value: ValidatedText }
  | {
      readonly ok: false;
      readonly error: MissingSectionError;
      readonly lengthWarning?: LengthOutOfRange;
    };

export interface SectionCheck {
  readonly missing: string[];
  readonly outOfOrder: string[];
}

const HEADING = /^\s{0,3}#{1,6}\s+(.*)$/;

/** Nominal range widened by the tolerance fraction on both ends */
export function allowedRange(nominal: WordRange, tolerance: number): WordRange {
  return {
    min: Math.round(nominal.min * (1 - tolerance)),
    max: Math.round(nominal.max * (1 + tolerance)),
  };
}

/**
 * Each required label must appear, in order, in its own markdown heading.
 * Labels match whole words, case-insensitively. A label found only in an
 * earlier heading than its predecessor is reported out of order.
 */
export function checkSections(
  text: string,
  requiredSections: readonly string[],
): SectionCheck {
  const headings: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = HEADING.exec(line);
    if (match) {
      headings.push(match[1]);
    }
  }

  const missing: string[] = [];
  const outOfOrder: string[] = [];
  let cursor = 0;

  for (const label of requiredSections) {
    const pattern = labelPattern(label);
    const index = headings.findIndex((h, i) => i >= cursor && pattern.test(h));

    if (index >= 0) {
      cursor = index + 1;
    } else if (headings.some((h) => pattern.test(h))) {
      outOfOrder.push(label);
    } else {
      missing.push(label);
    }
  }

  return { missing, outOfOrder };
}

/**
 * Artifact Validator
 *
 * Checks generated text against the protocol's contract. Length is a soft
 * constraint; section structure is hard. Both are measured on the body that
 * will be persisted, so the stored word count agrees with the length flag. Stateless, so validating the same
 * text twice gives the same verdict.
 */
@injectable()
export class ArtifactValidator {
  private readonly tolerance: number;

  constructor(@inject(TYPES.Config) config: IConfig) {
    this.tolerance = config.lengthTolerance;
  }

  validate(result: GenerationResult, protocol: Protocol): ValidationVerdict {
    const text = stripLeadingTitle(result.text, protocol.requiredSections);
    const wordCount = countWords(text);
    const lengthWarning = this.checkLength(wordCount, protocol.wordRange);

    const sections = checkSections(text, protocol.requiredSections);
    if (sections.missing.length > 0 || sections.outOfOrder.length > 0) {
      return {
        ok: false,
        error: new MissingSectionError(
          protocol.id,
          sections.missing,
          sections.outOfOrder,
        ),
        lengthWarning,
      };
    }

    return { ok: true, value: { text, wordCount, lengthWarning } };
  }

  private checkLength(
    wordCount: number,
    nominal: WordRange,
  ): LengthOutOfRange | undefined {
    const allowed = allowedRange(nominal, this.tolerance);
    if (wordCount >= allowed.min && wordCount <= allowed.max) {
      return undefined;
    }
    return { kind: "LengthOutOfRange", wordCount, allowed, nominal };
  }
}
