import { ValidationError } from "../../shared/errors/InputErrors";

/**
 * ScriptureReference Value Object
 *
 * A citation, the raw text it refers to, and where the text came from
 * (a translation code, "pasted", or a lectionary source). Calendar
 * readings carry a label such as "Watchword" or "Gospel".
 */
export class ScriptureReference {
  private constructor(
    public readonly citation: string,
    public readonly text: string,
    public readonly source: string,
    public readonly label?: string,
  ) {
    Object.freeze(this);
  }

  static create(
    citation: string,
    text: string,
    source: string,
    label?: string,
  ): ScriptureReference {
    const normalizedCitation = citation.replace(/\s+/g, " ").trim();

    if (normalizedCitation === "") {
      throw new ValidationError("Citation must not be empty", "citation");
    }

    return new ScriptureReference(
      normalizedCitation,
      text.trim(),
      source,
      label?.trim() || undefined,
    );
  }

  /**
   * Fold several references (e.g. a day's calendar readings) into one,
   * headed by their labels so the protocol treats them as equals.
   */
  static combine(references: readonly ScriptureReference[]): ScriptureReference {
    if (references.length === 0) {
      throw new ValidationError("Nothing to combine", "references");
    }
    if (references.length === 1) {
      return references[0];
    }

    const citation = references.map((ref) => ref.citation).join(" | ");

    const text = references
      .map((ref) => {
        const heading = ref.label
          ? `${ref.label.toUpperCase()} — ${ref.citation}`
          : ref.citation;
        return `${heading}:\n${ref.text}`;
      })
      .join("\n\n");

    const sources = [...new Set(references.map((ref) => ref.source))];

    return new ScriptureReference(citation, text, sources.join(", "));
  }

  wordCount(): number {
    const trimmed = this.text.trim();
    return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
  }

  toString(): string {
    return this.citation;
  }
}
