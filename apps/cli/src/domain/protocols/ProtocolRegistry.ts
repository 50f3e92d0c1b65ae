import fs from "fs";
import path from "path";
import { ZodError } from "zod";
import {
  Protocol,
  ProtocolId,
  PROTOCOL_IDS,
  freezeProtocol,
  isProtocolId,
} from "./Protocol";
import {
  ProtocolDefinition,
  protocolDefinitionSchema,
} from "./protocolDefinition";
import {
  TemplateError,
  UnknownProtocolError,
} from "../../shared/errors/PipelineErrors";
import { errorMessage } from "../../shared/errors/errorMessage";

/** apps/cli/protocols, from both src/ and dist/ */
export const DEFAULT_PROTOCOLS_DIR = path.resolve(
  __dirname,
  "..",
  "..",
  "..",
  "protocols",
);

/**
 * Protocol Registry
 *
 * Holds the closed set of protocols. Populated once at startup from the
 * static definition files; exposes no mutation.
 */
export class ProtocolRegistry {
  private readonly protocols: ReadonlyMap<ProtocolId, Protocol>;

  constructor(protocols: readonly Protocol[]) {
    const byId = new Map<ProtocolId, Protocol>();

    for (const protocol of protocols) {
      if (byId.has(protocol.id)) {
        throw new TemplateError(protocol.id, "defined more than once");
      }
      byId.set(protocol.id, freezeProtocol(protocol));
    }

    const missing = PROTOCOL_IDS.filter((id) => !byId.has(id));
    if (missing.length > 0) {
      throw new TemplateError(missing[0], "no definition was loaded");
    }

    this.protocols = byId;
  }

  /**
   * Load every protocol definition (<id>.json + its prompt file) from a
   * directory.
   */
  static load(dir: string = DEFAULT_PROTOCOLS_DIR): ProtocolRegistry {
    return new ProtocolRegistry(
      PROTOCOL_IDS.map((id) => ProtocolRegistry.loadDefinition(dir, id)),
    );
  }

  private static loadDefinition(dir: string, id: ProtocolId): Protocol {
    const definitionPath = path.join(dir, `${id}.json`);

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(definitionPath, "utf-8"));
    } catch (error) {
      throw new TemplateError(
        id,
        `cannot read ${definitionPath}: ${errorMessage(error)}`,
      );
    }

    const definition = ProtocolRegistry.parseDefinition(id, raw);

    if (definition.id !== id) {
      throw new TemplateError(
        id,
        `${definitionPath} declares id "${definition.id}"`,
      );
    }

    const promptPath = path.join(dir, definition.promptFile);
    let systemPrompt: string;
    try {
      systemPrompt = fs.readFileSync(promptPath, "utf-8").trim();
    } catch (error) {
      throw new TemplateError(
        id,
        `cannot read prompt file ${promptPath}: ${errorMessage(error)}`,
      );
    }

    if (systemPrompt === "") {
      throw new TemplateError(id, `prompt file ${promptPath} is empty`);
    }

    return {
      id: definition.id,
      version: definition.version,
      displayName: definition.displayName,
      summary: definition.summary,
      requiredSections: definition.requiredSections,
      wordRange: definition.wordRange,
      tone: definition.tone,
      maxTokens: definition.maxTokens,
      readingMinutes: definition.readingMinutes,
      systemPrompt,
      inputTemplate: definition.inputTemplate,
      usesCollisionVectors: definition.usesCollisionVectors,
    };
  }

  private static parseDefinition(
    id: ProtocolId,
    raw: unknown,
  ): ProtocolDefinition {
    try {
      return protocolDefinitionSchema.parse(raw);
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = error.issues
          .map(
            (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
          )
          .join("; ");
        throw new TemplateError(id, issues);
      }
      throw error;
    }
  }

  get(protocolId: string): Protocol {
    const protocol = this.find(protocolId);
    if (!protocol) {
      throw new UnknownProtocolError(protocolId, PROTOCOL_IDS);
    }

    return protocol;
  }

  has(protocolId: string): boolean {
    return this.find(protocolId) !== undefined;
  }

  list(): Protocol[] {
    return PROTOCOL_IDS.flatMap((id) => {
      const protocol = this.protocols.get(id);
      return protocol ? [protocol] : [];
    });
  }

  /** Ids are matched trimmed and lower-cased */
  private find(protocolId: string): Protocol | undefined {
    const normalized = protocolId.trim().toLowerCase();
    return isProtocolId(normalized) ? this.protocols.get(normalized) : undefined;
  }
}
