import { describe, it, expect } from "@jest/globals";
import { buildProgram } from "../program";
import { CliIO, PastedPassage } from "../CliIO";
import { ErrorReporter } from "../ErrorReporter";
import { TestPipeline, testPipeline } from "../../../__tests__/helpers/pipeline";
import { StubBackend, StubCalendarSource, StubPassageSource } from "../../../__tests__/helpers/stubs";
import { studyText } from "../../../__tests__/helpers/studyText";

const THRESHOLD_SECTIONS = [
  "Archaeological Dive",
  "Theological Combustion",
  "Present Friction",
  "Embodied Practice",
  "Tech Touchpoint",
];

/** Captures everything a command writes */
class RecordingIO implements CliIO {
  public outs: string[] = [];
  public errs: string[] = [];
  public exitCode: number | undefined;
  public pasteRequests: Array<string | undefined> = [];

  constructor(private readonly pasted: PastedPassage = { citation: "", text: "" }) {}

  out(text: string): void {
    this.outs.push(text);
  }

  err(text: string): void {
    this.errs.push(text);
  }

  async readPaste(citation?: string): Promise<PastedPassage> {
    this.pasteRequests.push(citation);
    return { citation: citation ?? this.pasted.citation, text: this.pasted.text };
  }

  setExitCode(code: number): void {
    this.exitCode = code;
  }
}

async function runCli(
  args: string[],
  pipeline: TestPipeline,
  io: RecordingIO = new RecordingIO(),
): Promise<RecordingIO> {
  const program = buildProgram({
    config: pipeline.config,
    registry: pipeline.registry,
    vectors: pipeline.vectors,
    generateStudy: pipeline.generateStudy,
    listStudies: pipeline.listStudies,
    getStudy: pipeline.getStudy,
    reporter: new ErrorReporter(pipeline.logger, (line) => io.err(line)),
    io,
    signal: new AbortController().signal,
  });
  program.exitOverride();
  program.configureOutput({ writeOut: (text) => io.out(text), writeErr: (text) => io.err(text) });

  await program.parseAsync(["node", "lectionary", ...args]);
  return io;
}

const passages = (): StubPassageSource =>
  new StubPassageSource({ "John 3:16-21": "The lamp was set on a stand." });

describe("lectionary CLI", () => {
  describe("run", () => {
    it("should print the study and where it was saved", async () => {
      const pipeline = testPipeline({
        passages: passages(),
        backend: StubBackend.text(studyText(THRESHOLD_SECTIONS, 2900)),
      });

      const io = await runCli(["run", "threshold", "John", "3:16-21"], pipeline);

      expect(io.exitCode).toBeUndefined();
      expect(io.outs).toHaveLength(1);
      expect(io.outs[0].startsWith("---\nengine: threshold\nreference: John 3:16-21\n")).toBe(true);
      expect(io.errs).toEqual([
        "═══ Lectionary Engines: THRESHOLD ═══",
        "Generating study... this may take a few minutes.",
        "✓ Study saved to: memory/threshold_john-3-16-21_20261019.md",
      ]);
    });

    it("should warn about length but still save", async () => {
      const pipeline = testPipeline({
        passages: passages(),
        backend: StubBackend.text(studyText(THRESHOLD_SECTIONS, 3885)),
      });

      const io = await runCli(["run", "threshold", "John 3:16-21"], pipeline);

      expect(io.exitCode).toBeUndefined();
      expect(io.errs.slice(-2)).toEqual([
        "! Length 3885 words is outside 2250-3850 (protocol range 2500-3500); saved anyway.",
        "✓ Study saved to: memory/threshold_john-3-16-21_20261019.md",
      ]);
    });

    it("should report an unknown engine", async () => {
      const io = await runCli(["run", "lighthouse", "John 3:16-21"], testPipeline());

      expect(io.exitCode).toBe(1);
      expect(io.errs).toEqual([
        '✗ [render] UnknownProtocol: Unknown protocol "lighthouse". Choose from: threshold, palimpsest, collision',
      ]);
    });

    it("should report a study with missing sections and save nothing", async () => {
      const pipeline = testPipeline({
        passages: passages(),
        backend: StubBackend.text(studyText(THRESHOLD_SECTIONS.slice(1), 2900)),
      });

      const io = await runCli(["run", "threshold", "John 3:16-21"], pipeline);

      expect(io.exitCode).toBe(1);
      expect(io.errs.slice(-2)).toEqual([
        "✗ [validate] MissingSection: Study does not follow the required section structure (missing Archaeological Dive)",
        "  The study was not saved.",
      ]);
      expect(io.outs).toEqual([]);
      expect(pipeline.repository.count()).toBe(0);
    });

    it("should reject a tone that is not a number", async () => {
      const io = await runCli(["run", "threshold", "John 3:16-21", "--tone", "warm"], testPipeline());

      expect(io.exitCode).toBe(1);
      expect(io.errs.slice(-1)).toEqual([
        '✗ [input] ValidationError: Tone level must be a number, got "warm"',
      ]);
    });

    it("should pass the translation to the resolver", async () => {
      const pipeline = testPipeline({
        passages: passages(),
        backend: StubBackend.text(studyText(THRESHOLD_SECTIONS, 2900)),
      });

      await runCli(["run", "threshold", "John 3:16-21", "-t", "niv"], pipeline);

      expect(pipeline.passages.requests).toEqual([{ citation: "John 3:16-21", translation: "NIV" }]);
    });
  });

  describe("moravian", () => {
    it("should use the default engine and report an unavailable calendar", async () => {
      const pipeline = testPipeline({ calendar: new StubCalendarSource() });

      const io = await runCli(["moravian"], pipeline);

      expect(io.exitCode).toBe(1);
      expect(io.errs).toEqual([
        "═══ Lectionary Engines: THRESHOLD ═══",
        "Generating study... this may take a few minutes.",
        "✗ [resolve] SourceUnavailable: Moravian Daily Texts is unavailable: no readings found for 2026-10-19",
      ]);
      expect(pipeline.backend.calls).toHaveLength(0);
    });
  });

  describe("rcl", () => {
    it("should reject an unknown reading slot", async () => {
      const io = await runCli(["rcl", "palimpsest", "-r", "hymn"], testPipeline());

      expect(io.exitCode).toBe(1);
      expect(io.errs).toEqual([
        '✗ [input] ValidationError: Invalid reading "hymn". Choose from: ot, psalm, epistle, gospel',
      ]);
    });
  });

  describe("paste", () => {
    it("should generate from pasted text", async () => {
      const pipeline = testPipeline({
        backend: StubBackend.text(studyText(THRESHOLD_SECTIONS, 2900)),
      });
      const io = new RecordingIO({ citation: "", text: "The seed sprouts and grows." });

      await runCli(["paste", "-r", "Mark 4:26-29"], pipeline, io);

      expect(io.exitCode).toBeUndefined();
      expect(io.pasteRequests).toEqual(["Mark 4:26-29"]);
      expect(pipeline.backend.calls[0].prompt.user).toContain("The seed sprouts and grows.");
      expect(io.errs.slice(-1)).toEqual([
        "✓ Study saved to: memory/threshold_mark-4-26-29_20261019.md",
      ]);
    });

    it("should require a reference", async () => {
      const io = new RecordingIO({ citation: "", text: "Some text." });

      await runCli(["paste"], testPipeline(), io);

      expect(io.exitCode).toBe(1);
      expect(io.errs).toEqual(["✗ [input] ValidationError: A biblical reference is required"]);
    });
  });

  describe("list and show", () => {
    it("should say when nothing is saved", async () => {
      const io = await runCli(["list"], testPipeline());

      expect(io.outs).toEqual(["No saved studies found"]);
    });

    it("should list a saved study and print it back", async () => {
      const pipeline = testPipeline({
        passages: passages(),
        backend: StubBackend.text(studyText(THRESHOLD_SECTIONS, 2900)),
      });
      const generated = await runCli(["run", "threshold", "John 3:16-21"], pipeline);

      const listed = await runCli(["list"], pipeline);
      const shown = await runCli(["show", "threshold_john-3-16-21_20261019"], pipeline);

      expect(listed.outs).toEqual([
        [
          "1. [threshold] John 3:16-21",
          "   Date: 2026-10-19",
          "   Words: 2900",
          "   Slug: threshold_john-3-16-21_20261019",
          "   File: memory/threshold_john-3-16-21_20261019.md",
        ].join("\n"),
      ]);
      expect(shown.outs).toEqual(generated.outs);
    });

    it("should report an unknown study", async () => {
      const io = await runCli(["show", "nothing-here"], testPipeline());

      expect(io.exitCode).toBe(1);
      expect(io.errs).toEqual(['✗ [store] ArtifactNotFound: Study "nothing-here" not found']);
    });
  });

  describe("info commands", () => {
    it("should describe the protocols", async () => {
      const io = await runCli(["protocols"], testPipeline());

      expect(io.outs[0].split("\n")[0]).toBe("threshold (v1.0.0): 2500-3500 words, 20-30 min");
    });

    it("should list the vectors of one category", async () => {
      const io = await runCli(["vectors", "Personal"], testPipeline());

      expect(io.outs[0].startsWith("personal:\n  - Chronic illness and the loss of a future\n")).toBe(true);
    });

    it("should reject an unknown vector category", async () => {
      const io = await runCli(["vectors", "culinary"], testPipeline());

      expect(io.exitCode).toBe(1);
      expect(io.errs).toEqual([
        '✗ [input] ValidationError: Unknown category "culinary". Choose from: scientific, cultural, philosophical, technological, personal',
      ]);
    });

    it("should show the configuration without secrets", async () => {
      const io = await runCli(["config"], testPipeline());

      expect(io.outs[0]).toContain("API Key: ✓ Set");
      expect(io.outs[0]).toContain("Default Engine: threshold");
      expect(io.outs[0]).toContain("Length Tolerance: ±10%");
      expect(io.outs[0]).not.toContain("test-openai-key");
    });
  });
});
