/**
 * Prompt Renderer
 *
 * Turns a protocol and a resolved reference into the exact payload sent to
 * the generation backend. Pure: the same protocol, reference and options
 * always render the same request, correlation id included.
 */

import { createHash } from "crypto";
import { injectable } from "tsyringe";
import { Protocol } from "../../protocols/Protocol";
import {
  COLLISION_CATEGORIES,
  CollisionVectors,
} from "../../protocols/CollisionVectors";
import { ScriptureReference } from "../../scripture/ScriptureReference";
import {
  StudyPreferences,
  withLengthPreference,
} from "../value-objects/StudyPreferences";
import { GenerationRequest } from "../entities/Generation";
import { TemplateError } from "../../../shared/errors/PipelineErrors";

export interface RenderOptions {
  preferences?: StudyPreferences;
  collisionVectors?: CollisionVectors;
}

const PLACEHOLDER = /\{\{\s*([A-Za-z_]+)\s*\}\}/g;
const KNOWN_PLACEHOLDERS = ["reference", "text", "source", "vectors"];
const REQUIRED_PLACEHOLDERS = ["reference", "text"];

const CATEGORY_LABELS: Record<(typeof COLLISION_CATEGORIES)[number], string> = {
  scientific: "Scientific",
  cultural: "Cultural",
  philosophical: "Philosophical",
  technological: "Technological",
  personal: "Personal",
};

const TONE_GUIDANCE = {
  academic:
    "Emphasize scholarly analysis, historical context, and original language insights. Use precise theological terminology.",
  balanced:
    "Balance scholarly depth with personal application. Include both analysis and reflection.",
  devotional:
    "Emphasize personal reflection, spiritual formation, and heart engagement. Use warm, inviting language.",
} as const;

const LANGUAGE_GUIDANCE = {
  accessible:
    "Use clear, everyday language. Explain theological terms when you use them.",
  standard:
    "Use standard theological vocabulary with brief explanations where helpful.",
  advanced:
    "Use technical theological and biblical studies terminology freely.",
} as const;

@injectable()
export class PromptRenderer {
  render(
    baseProtocol: Protocol,
    reference: ScriptureReference,
    options: RenderOptions = {},
  ): GenerationRequest {
    const protocol = withLengthPreference(baseProtocol, options.preferences);
    this.checkProtocol(protocol);

    const values: Record<string, string> = {
      reference: reference.citation,
      text: reference.text,
      source: reference.source,
      vectors: this.vectorsBlock(protocol, options.collisionVectors),
    };

    // Single pass: substituted values are never rescanned for placeholders
    const filled = protocol.inputTemplate.replace(
      PLACEHOLDER,
      (_match, name: string) => values[name],
    );

    const prompt = `${filled.trimEnd()}\n\n${this.outputContract(protocol)}`;
    const system = this.applyPreferences(
      protocol.systemPrompt,
      options.preferences,
    );

    return {
      correlationId: PromptRenderer.correlationId(protocol, system, prompt),
      protocolId: protocol.id,
      protocolVersion: protocol.version,
      citation: reference.citation,
      system,
      prompt,
      constraints: {
        minWords: protocol.wordRange.min,
        maxWords: protocol.wordRange.max,
        maxTokens: protocol.maxTokens,
        requiredSections: protocol.requiredSections,
      },
    };
  }

  private checkProtocol(protocol: Protocol): void {
    if (protocol.requiredSections.length === 0) {
      throw new TemplateError(protocol.id, "no required sections");
    }
    if (protocol.wordRange.min <= 0 || protocol.wordRange.min >= protocol.wordRange.max) {
      throw new TemplateError(
        protocol.id,
        `word range ${protocol.wordRange.min}-${protocol.wordRange.max} is empty`,
      );
    }

    const names = [...protocol.inputTemplate.matchAll(PLACEHOLDER)].map(
      (match) => match[1],
    );

    const unknown = names.filter((name) => !KNOWN_PLACEHOLDERS.includes(name));
    if (unknown.length > 0) {
      throw new TemplateError(
        protocol.id,
        `unknown placeholder(s) ${unknown.map((name) => `{{${name}}}`).join(", ")}`,
      );
    }

    const absent = REQUIRED_PLACEHOLDERS.filter((name) => !names.includes(name));
    if (absent.length > 0) {
      throw new TemplateError(
        protocol.id,
        `input template lacks ${absent.map((name) => `{{${name}}}`).join(", ")}`,
      );
    }

    if (protocol.usesCollisionVectors && !names.includes("vectors")) {
      throw new TemplateError(protocol.id, "input template lacks {{vectors}}");
    }
  }

  private vectorsBlock(
    protocol: Protocol,
    vectors: CollisionVectors | undefined,
  ): string {
    if (!protocol.usesCollisionVectors || !vectors) {
      return "";
    }

    const lines = COLLISION_CATEGORIES.map(
      (category) => `- ${CATEGORY_LABELS[category]}: ${vectors[category]}`,
    );
    return `\nCollision Vectors:\n${lines.join("\n")}\n`;
  }

  private outputContract(protocol: Protocol): string {
    const sections = protocol.requiredSections
      .map((label, i) => `${i + 1}. ${label}`)
      .join("\n");

    return [
      "## OUTPUT CONTRACT",
      "",
      `Length: between ${protocol.wordRange.min} and ${protocol.wordRange.max} words.`,
      "Sections: present these sections in this order, each under its own markdown heading that contains the section name:",
      sections,
    ].join("\n");
  }

  /**
   * Insert the reader's customizations ahead of the protocol's first
   * "##" heading so they frame every instruction that follows.
   */
  private applyPreferences(
    systemPrompt: string,
    preferences: StudyPreferences | undefined,
  ): string {
    if (!preferences || preferences.isEmpty()) {
      return systemPrompt;
    }

    const lines = ["## USER CUSTOMIZATION", ""];

    const tone = preferences.toneCategory();
    if (tone && preferences.toneLevel !== undefined) {
      lines.push(
        `**Tone (${preferences.toneLevel}/${StudyPreferences.MAX_TONE}, ${tone}):** ${TONE_GUIDANCE[tone]}`,
      );
    }
    const length = preferences.lengthConstraints();
    if (length && preferences.length) {
      lines.push(
        `**Length (${preferences.length}):** Aim for ${length.wordRange.min}-${length.wordRange.max} words in total.`,
      );
    }
    if (preferences.language) {
      lines.push(
        `**Language (${preferences.language}):** ${LANGUAGE_GUIDANCE[preferences.language]}`,
      );
    }
    if (preferences.focusAreas) {
      lines.push(`**Focus areas:** Give particular attention to ${preferences.focusAreas}.`);
    }

    const block = `${lines.join("\n")}\n\n`;
    const firstHeading = systemPrompt.indexOf("##");

    return firstHeading === -1
      ? `${systemPrompt.trimEnd()}\n\n${block.trimEnd()}`
      : systemPrompt.slice(0, firstHeading) + block + systemPrompt.slice(firstHeading);
  }

  private static correlationId(
    protocol: Protocol,
    system: string,
    prompt: string,
  ): string {
    return createHash("sha256")
      .update(`${protocol.id}@${protocol.version}\u0000${system}\u0000${prompt}`)
      .digest("hex")
      .slice(0, 16);
  }
}
