/**
 * Whitespace-separated token count. Markdown markers such as "##" count as
 * words, the same way a reader's word-count tool sees them.
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
}
