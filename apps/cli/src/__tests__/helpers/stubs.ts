import type {
  BackendCompletion,
  BackendConstraints,
  BackendPrompt,
  IGenerationBackend,
} from "../../domain/studies/services/IGenerationBackend";
import type {
  CalendarReading,
  ICalendarSource,
  IPassageSource,
  LectionaryCalendar,
} from "../../domain/scripture/ITextSource";
import type { Translation } from "../../domain/scripture/Translation";
import type { Protocol } from "../../domain/protocols/Protocol";
import { freezeProtocol } from "../../domain/protocols/Protocol";

export interface BackendCall {
  prompt: BackendPrompt;
  constraints: BackendConstraints;
  signal: AbortSignal;
}

type BackendReply = BackendCompletion | Error | ((signal: AbortSignal) => Promise<BackendCompletion>);

/** Replays queued replies in order; the last reply repeats */
export class StubBackend implements IGenerationBackend {
  public calls: BackendCall[] = [];

  constructor(private readonly replies: BackendReply[]) {}

  static text(text: string, finishReason: BackendCompletion["finishReason"] = "stop"): StubBackend {
    return new StubBackend([{ text, finishReason, model: "stub-model" }]);
  }

  async generateText(
    prompt: BackendPrompt,
    constraints: BackendConstraints,
    signal: AbortSignal,
  ): Promise<BackendCompletion> {
    const reply = this.replies[Math.min(this.calls.length, this.replies.length - 1)];
    this.calls.push({ prompt, constraints, signal });

    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === "function") {
      return reply(signal);
    }
    return reply;
  }
}

/** Passage texts keyed by citation; missing citations have no text */
export class StubPassageSource implements IPassageSource {
  public requests: Array<{ citation: string; translation: Translation }> = [];

  constructor(
    private readonly passages: Record<string, string> = {},
    private readonly failure?: Error,
  ) {}

  async fetchPassage(citation: string, translation: Translation): Promise<string | null> {
    this.requests.push({ citation, translation });
    if (this.failure) {
      throw this.failure;
    }
    return this.passages[citation] ?? null;
  }
}

export class StubCalendarSource implements ICalendarSource {
  public requests: Array<{ calendar: LectionaryCalendar; date: Date }> = [];

  constructor(
    private readonly readings: Partial<Record<LectionaryCalendar, CalendarReading[]>> = {},
    private readonly failure?: Error,
  ) {}

  async readingsFor(calendar: LectionaryCalendar, date: Date): Promise<CalendarReading[]> {
    this.requests.push({ calendar, date });
    if (this.failure) {
      throw this.failure;
    }
    return this.readings[calendar] ?? [];
  }
}

/** Small protocol for tests that should not depend on the shipped prompts */
export function testProtocol(overrides: Partial<Protocol> = {}): Protocol {
  return freezeProtocol({
    id: "threshold",
    version: "9.9.9",
    displayName: "Threshold",
    summary: "Test protocol",
    requiredSections: ["Alpha", "Beta", "Gamma"],
    wordRange: { min: 100, max: 200 },
    tone: "Plain",
    maxTokens: 1000,
    readingMinutes: "5",
    systemPrompt: "You write studies.\n\n## RULES\n\nFollow the contract.",
    inputTemplate: "Reference: {{reference}}\nSource: {{source}}\n\n{{text}}",
    usesCollisionVectors: false,
    ...overrides,
  });
}
