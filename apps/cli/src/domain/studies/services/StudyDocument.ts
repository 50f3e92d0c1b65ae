/**
 * Study document format
 *
 *   ---
 *   engine: threshold
 *   reference: John 3:16-21
 *   date: 2026-10-19
 *   word_count: 2900
 *   ---
 *
 *   # Threshold Study: John 3:16-21
 *
 *   <body>
 */

export interface Frontmatter {
  readonly engine: string;
  readonly reference: string;
  readonly date: string;
  readonly word_count: number;
}

export interface ParsedDocument {
  readonly frontmatter: Frontmatter;
  readonly title: string;
  readonly body: string;
}

const FENCE = "---";

export function studyTitle(displayName: string, citation: string): string {
  return `${displayName} Study: ${citation}`;
}

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** Whole-word, case-insensitive matcher for a section label inside a heading */
export function labelPattern(label: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(label)}\\b`, "i");
}

/**
 * Drop a top-level heading the model may have added; the document has its
 * own. An H1 naming one of the required sections is a section, not a title,
 * and stays.
 */
export function stripLeadingTitle(
  text: string,
  requiredSections: readonly string[] = [],
): string {
  const trimmed = text.trim();
  const match = /^#\s+(.*)/.exec(trimmed);
  if (!match) {
    return trimmed;
  }
  const heading = match[1];
  if (requiredSections.some((label) => labelPattern(label).test(heading))) {
    return trimmed;
  }
  const newline = trimmed.indexOf("\n");
  return newline === -1 ? "" : trimmed.slice(newline + 1).trim();
}

export function formatDocument(
  frontmatter: Frontmatter,
  title: string,
  body: string,
): string {
  return [
    FENCE,
    `engine: ${frontmatter.engine}`,
    `reference: ${frontmatter.reference}`,
    `date: ${frontmatter.date}`,
    `word_count: ${frontmatter.word_count}`,
    FENCE,
    "",
    `# ${title}`,
    "",
    `${body.trim()}\n`,
  ].join("\n");
}

/** Inverse of formatDocument; null when the content is not a study document */
export function parseDocument(content: string): ParsedDocument | null {
  const lines = content.replace(/\r\n/g, "\n").split("\n");
  if (lines[0] !== FENCE) {
    return null;
  }

  const close = lines.indexOf(FENCE, 1);
  if (close === -1) {
    return null;
  }

  const fields = new Map<string, string>();
  for (const line of lines.slice(1, close)) {
    const separator = line.indexOf(":");
    if (separator > 0) {
      fields.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
    }
  }

  const engine = fields.get("engine");
  const reference = fields.get("reference");
  const date = fields.get("date");
  const wordCount = Number(fields.get("word_count"));
  if (!engine || !reference || !date || !Number.isInteger(wordCount)) {
    return null;
  }

  let cursor = close + 1;
  while (cursor < lines.length && lines[cursor].trim() === "") cursor++;

  let title = "";
  if (cursor < lines.length && lines[cursor].startsWith("# ")) {
    title = lines[cursor].slice(2).trim();
    cursor++;
  }

  const body = lines.slice(cursor).join("\n").trim();

  return {
    frontmatter: { engine, reference, date, word_count: wordCount },
    title,
    body,
  };
}
