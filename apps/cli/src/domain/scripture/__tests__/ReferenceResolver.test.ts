import { describe, it, expect, beforeEach } from "@jest/globals";
import { ReferenceResolver, selectRclReading } from "../ReferenceResolver";
import type { CalendarReading } from "../ITextSource";
import { MockLogger } from "../../../infrastructure/logging/__tests__/MockLogger";
import { StubCalendarSource, StubPassageSource } from "../../../__tests__/helpers/stubs";
import { testConfig } from "../../../__tests__/helpers/testConfig";
import {
  ReferenceNotFoundError,
  SourceUnavailableError,
} from "../../../shared/errors/PipelineErrors";
import { ValidationError } from "../../../shared/errors/InputErrors";

const TODAY = new Date(2026, 9, 19);

const PASSAGES = {
  "John 3:16-21": "The light came into the lamp room.",
  "Psalm 5:3": "In the morning I lay out my words.",
  "Isaiah 40:1": "Comfort, comfort the harbor town.",
  "Luke 12:13-21": "A farmer built larger barns.",
};

const RCL_READINGS: CalendarReading[] = [
  { label: "First reading", citation: "Isaiah 40:1" },
  { label: "Psalm", citation: "Psalm 5:3" },
  { label: "Second reading", citation: "John 3:16-21" },
  { label: "Gospel", citation: "Luke 12:13-21" },
];

describe("ReferenceResolver", () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = new MockLogger();
  });

  function resolverWith(
    passages: StubPassageSource,
    calendar: StubCalendarSource = new StubCalendarSource(),
    env: Record<string, string> = {},
  ): ReferenceResolver {
    return new ReferenceResolver(passages, calendar, testConfig(env), () => TODAY, logger);
  }

  describe("explicit citations", () => {
    it("should fetch the passage in the default translation", async () => {
      const passages = new StubPassageSource(PASSAGES);

      const [reference] = await resolverWith(passages).resolve({
        kind: "explicit",
        citation: "  John 3:16-21 ",
      });

      expect(reference.citation).toBe("John 3:16-21");
      expect(reference.text).toBe("The light came into the lamp room.");
      expect(reference.source).toBe("NRSVUE");
      expect(passages.requests).toEqual([{ citation: "John 3:16-21", translation: "NRSVue" }]);
    });

    it("should honor a requested translation and the configured default", async () => {
      const passages = new StubPassageSource(PASSAGES);
      const resolver = resolverWith(passages, undefined, { DEFAULT_TRANSLATION: "ceb" });

      const requested = await resolver.resolveOne({
        kind: "explicit",
        citation: "John 3:16-21",
        translation: "NIV",
      });
      const fallback = await resolver.resolveOne({ kind: "explicit", citation: "Psalm 5:3" });

      expect(requested.source).toBe("NIV");
      expect(fallback.source).toBe("CEB");
    });

    it("should throw ReferenceNotFoundError when the source has no text", async () => {
      const resolver = resolverWith(new StubPassageSource({ "Hezekiah 1:1": "  " }));

      await expect(
        resolver.resolve({ kind: "explicit", citation: "Hezekiah 1:1" }),
      ).rejects.toThrow(ReferenceNotFoundError);
      await expect(
        resolver.resolve({ kind: "explicit", citation: "Obadiah 2:1" }),
      ).rejects.toThrow('No text found for "Obadiah 2:1": Bible Gateway has no NRSVue text for it');
    });

    it("should throw SourceUnavailableError when the source cannot be reached", async () => {
      const resolver = resolverWith(new StubPassageSource({}, new Error("connect ECONNREFUSED")));

      await expect(
        resolver.resolve({ kind: "explicit", citation: "John 3:16" }),
      ).rejects.toThrow("Bible Gateway is unavailable: connect ECONNREFUSED");
    });

    it("should reject an empty citation before fetching", async () => {
      const passages = new StubPassageSource(PASSAGES);

      await expect(
        resolverWith(passages).resolve({ kind: "explicit", citation: "   " }),
      ).rejects.toThrow(ValidationError);
      expect(passages.requests).toHaveLength(0);
    });

    it("should warn about citations that do not look like Book Chapter:Verse", async () => {
      await resolverWith(new StubPassageSource({ "the prodigal son": "A son went far away." })).resolve({
        kind: "explicit",
        citation: "the prodigal son",
      });

      expect(logger.messages("warn")).toEqual(["Reference does not look like Book Chapter:Verse"]);
    });
  });

  describe("moravian", () => {
    it("should resolve every reading of the day into one labeled reference", async () => {
      const calendar = new StubCalendarSource({
        moravian: [
          { label: "Watchword", citation: "Psalm 5:3" },
          { label: "Daily Text", citation: "John 3:16-21" },
        ],
      });

      const reference = await resolverWith(new StubPassageSource(PASSAGES), calendar).resolveOne({
        kind: "moravian",
      });

      expect(calendar.requests).toEqual([{ calendar: "moravian", date: TODAY }]);
      expect(reference.citation).toBe("Psalm 5:3 | John 3:16-21");
      expect(reference.text).toBe(
        "WATCHWORD — Psalm 5:3:\nIn the morning I lay out my words.\n\n" +
          "DAILY TEXT — John 3:16-21:\nThe light came into the lamp room.",
      );
      expect(reference.source).toBe("NRSVUE");
    });

    it("should skip readings that cannot be fetched", async () => {
      const calendar = new StubCalendarSource({
        moravian: [
          { label: "Watchword", citation: "Psalm 5:3" },
          { label: "Daily Text", citation: "Obadiah 2:1" },
        ],
      });

      const references = await resolverWith(new StubPassageSource(PASSAGES), calendar).resolve({
        kind: "moravian",
      });

      expect(references.map((ref) => ref.citation)).toEqual(["Psalm 5:3"]);
      expect(logger.messages("warn")).toEqual(["Skipping reading that could not be fetched"]);
    });

    it("should throw SourceUnavailableError when the calendar has no readings", async () => {
      const passages = new StubPassageSource(PASSAGES);

      await expect(
        resolverWith(passages, new StubCalendarSource()).resolve({ kind: "moravian" }),
      ).rejects.toThrow("Moravian Daily Texts is unavailable: no readings found for 2026-10-19");
      expect(passages.requests).toHaveLength(0);
    });

    it("should throw SourceUnavailableError when the calendar cannot be reached", async () => {
      const calendar = new StubCalendarSource({}, new Error("HTTP 503"));

      await expect(
        resolverWith(new StubPassageSource(PASSAGES), calendar).resolve({ kind: "moravian" }),
      ).rejects.toThrow(SourceUnavailableError);
    });

    it("should fail when none of the readings can be fetched", async () => {
      const calendar = new StubCalendarSource({
        moravian: [{ label: "Watchword", citation: "Obadiah 2:1" }],
      });

      await expect(
        resolverWith(new StubPassageSource(PASSAGES), calendar).resolve({ kind: "moravian" }),
      ).rejects.toThrow(
        "Moravian Daily Texts is unavailable: none of today's readings could be fetched",
      );
    });
  });

  describe("rcl", () => {
    const calendar = (): StubCalendarSource => new StubCalendarSource({ rcl: RCL_READINGS });

    it("should default to the gospel reading", async () => {
      const reference = await resolverWith(new StubPassageSource(PASSAGES), calendar()).resolveOne({
        kind: "rcl",
      });

      expect(reference.citation).toBe("Luke 12:13-21");
      expect(reference.label).toBe("Gospel");
    });

    it("should pick the requested slot", async () => {
      const reference = await resolverWith(new StubPassageSource(PASSAGES), calendar()).resolveOne({
        kind: "rcl",
        slot: "psalm",
      });

      expect(reference.citation).toBe("Psalm 5:3");
    });

    it("should throw SourceUnavailableError when the lectionary lists nothing", async () => {
      await expect(
        resolverWith(new StubPassageSource(PASSAGES)).resolve({ kind: "rcl" }),
      ).rejects.toThrow("Revised Common Lectionary is unavailable: no readings found for 2026-10-19");
    });
  });

  describe("paste", () => {
    it("should use the pasted text without fetching", async () => {
      const passages = new StubPassageSource(PASSAGES);

      const reference = await resolverWith(passages).resolveOne({
        kind: "paste",
        citation: "Mark 4:26-29",
        text: "\nThe seed sprouts and grows.\n",
      });

      expect(reference.citation).toBe("Mark 4:26-29");
      expect(reference.text).toBe("The seed sprouts and grows.");
      expect(reference.source).toBe("pasted");
      expect(passages.requests).toHaveLength(0);
    });

    it("should throw ReferenceNotFoundError for empty pasted text", async () => {
      await expect(
        resolverWith(new StubPassageSource()).resolve({ kind: "paste", citation: "", text: " \n" }),
      ).rejects.toThrow('No text found for "pasted text": no text was supplied');
    });
  });

  describe("selectRclReading", () => {
    it("should match slots by label keyword", () => {
      expect(selectRclReading(RCL_READINGS, "ot")?.citation).toBe("Isaiah 40:1");
      expect(selectRclReading(RCL_READINGS, "epistle")?.citation).toBe("John 3:16-21");
    });

    it("should fall back to the conventional position for unlabeled readings", () => {
      const unlabeled = RCL_READINGS.map((reading) => ({ ...reading, label: "" }));

      expect(selectRclReading(unlabeled, "psalm")?.citation).toBe("Psalm 5:3");
      expect(selectRclReading(unlabeled.slice(0, 2), "gospel")?.citation).toBe("Psalm 5:3");
      expect(selectRclReading([], "gospel")).toBeUndefined();
    });
  });
});
