import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import type { IConfig } from "../../shared/config/IConfig";
import type { ILogger } from "../../infrastructure/logging/ILogger";
import type {
  CalendarReading,
  ICalendarSource,
  IPassageSource,
  LectionaryCalendar,
} from "./ITextSource";
import { ScriptureReference } from "./ScriptureReference";
import { Translation, parseTranslation, versionCode } from "./Translation";
import { Clock, isoDate } from "../../shared/clock";
import {
  ReferenceNotFoundError,
  SourceUnavailableError,
} from "../../shared/errors/PipelineErrors";
import { ValidationError } from "../../shared/errors/InputErrors";
import { errorMessage } from "../../shared/errors/errorMessage";

export const RCL_SLOTS = ["ot", "psalm", "epistle", "gospel"] as const;
export type RclSlot = (typeof RCL_SLOTS)[number];

export type ResolveInput =
  | { kind: "explicit"; citation: string; translation?: Translation }
  | { kind: "moravian"; translation?: Translation }
  | { kind: "rcl"; slot?: RclSlot; translation?: Translation }
  | { kind: "paste"; citation: string; text: string };

const CALENDAR_NAMES: Record<LectionaryCalendar, string> = {
  moravian: "Moravian Daily Texts",
  rcl: "Revised Common Lectionary",
};

const PASSAGE_SOURCE_NAME = "Bible Gateway";

const SLOT_KEYWORDS: Record<RclSlot, readonly string[]> = {
  ot: ["old testament", "first reading", "hebrew"],
  psalm: ["psalm"],
  epistle: ["epistle", "second reading", "new testament"],
  gospel: ["gospel"],
};

const CITATION_SHAPE = /^(\d\s)?[A-Za-z][A-Za-z ]*\s+\d+(:\d+)?/;

export function isRclSlot(value: string): value is RclSlot {
  return RCL_SLOTS.some((slot) => slot === value);
}

/**
 * Pick the reading for a slot: by label keyword first, then by the
 * conventional position (OT, Psalm, Epistle, Gospel), then the last one.
 */
export function selectRclReading(
  readings: readonly CalendarReading[],
  slot: RclSlot,
): CalendarReading | undefined {
  const byLabel = readings.find((reading) => {
    const label = reading.label.toLowerCase();
    return SLOT_KEYWORDS[slot].some((keyword) => label.includes(keyword));
  });
  if (byLabel) {
    return byLabel;
  }
  return readings[RCL_SLOTS.indexOf(slot)] ?? readings[readings.length - 1];
}

/**
 * Reference Resolver
 *
 * Produces the reference(s) a study is generated from. Each input form
 * fails on its own terms: a citation with no text is ReferenceNotFound, an
 * unreachable or empty source is SourceUnavailable.
 */
@injectable()
export class ReferenceResolver {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.PassageSource) private readonly passages: IPassageSource,
    @inject(TYPES.CalendarSource) private readonly calendar: ICalendarSource,
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Clock) private readonly clock: Clock,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ component: "ReferenceResolver" });
  }

  async resolve(input: ResolveInput): Promise<ScriptureReference[]> {
    switch (input.kind) {
      case "explicit":
        return [await this.resolveExplicit(input.citation, this.translationOf(input.translation))];
      case "moravian":
        return this.resolveMoravian(this.translationOf(input.translation));
      case "rcl":
        return [
          await this.resolveRcl(input.slot ?? "gospel", this.translationOf(input.translation)),
        ];
      case "paste":
        return [this.resolvePaste(input.citation, input.text)];
    }
  }

  /** resolve() folded into a single reference */
  async resolveOne(input: ResolveInput): Promise<ScriptureReference> {
    return ScriptureReference.combine(await this.resolve(input));
  }

  private translationOf(requested: Translation | undefined): Translation {
    return requested ?? parseTranslation(this.config.defaultTranslation);
  }

  private async resolveExplicit(
    citation: string,
    translation: Translation,
    label?: string,
  ): Promise<ScriptureReference> {
    const trimmed = citation.trim();
    if (trimmed === "") {
      throw new ValidationError("Reference must not be empty", "reference");
    }
    if (!CITATION_SHAPE.test(trimmed)) {
      this.logger.warn("Reference does not look like Book Chapter:Verse", {
        citation: trimmed,
      });
    }

    let text: string | null;
    try {
      text = await this.passages.fetchPassage(trimmed, translation);
    } catch (error) {
      throw new SourceUnavailableError(PASSAGE_SOURCE_NAME, errorMessage(error));
    }

    if (text === null || text.trim() === "") {
      throw new ReferenceNotFoundError(trimmed, `${PASSAGE_SOURCE_NAME} has no ${translation} text for it`);
    }

    this.logger.debug("Passage fetched", { citation: trimmed, translation });
    return ScriptureReference.create(trimmed, text, versionCode(translation), label);
  }

  private async resolveMoravian(
    translation: Translation,
  ): Promise<ScriptureReference[]> {
    const readings = await this.readingsFor("moravian");
    const references: ScriptureReference[] = [];

    for (const reading of readings) {
      try {
        references.push(
          await this.resolveExplicit(reading.citation, translation, reading.label),
        );
      } catch (error) {
        this.logger.warn("Skipping reading that could not be fetched", {
          citation: reading.citation,
          error: errorMessage(error),
        });
      }
    }

    if (references.length === 0) {
      throw new SourceUnavailableError(
        CALENDAR_NAMES.moravian,
        "none of today's readings could be fetched",
      );
    }

    return references;
  }

  private async resolveRcl(
    slot: RclSlot,
    translation: Translation,
  ): Promise<ScriptureReference> {
    const readings = await this.readingsFor("rcl");
    const reading = selectRclReading(readings, slot);
    if (!reading) {
      throw new SourceUnavailableError(CALENDAR_NAMES.rcl, `no ${slot} reading listed`);
    }

    this.logger.info("Selected lectionary reading", {
      slot,
      label: reading.label,
      citation: reading.citation,
    });
    return this.resolveExplicit(reading.citation, translation, reading.label);
  }

  private resolvePaste(citation: string, text: string): ScriptureReference {
    if (text.trim() === "") {
      throw new ReferenceNotFoundError(citation.trim() || "pasted text", "no text was supplied");
    }
    return ScriptureReference.create(citation, text, "pasted");
  }

  private async readingsFor(calendar: LectionaryCalendar): Promise<CalendarReading[]> {
    const date = this.clock();
    let readings: CalendarReading[];

    try {
      readings = await this.calendar.readingsFor(calendar, date);
    } catch (error) {
      throw new SourceUnavailableError(CALENDAR_NAMES[calendar], errorMessage(error));
    }

    if (readings.length === 0) {
      throw new SourceUnavailableError(
        CALENDAR_NAMES[calendar],
        `no readings found for ${isoDate(date)}`,
      );
    }

    this.logger.debug("Calendar readings", {
      calendar,
      date: isoDate(date),
      count: readings.length,
    });
    return readings;
  }
}
