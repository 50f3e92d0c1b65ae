import { compactDate } from "../../../shared/clock";

const MAX_CITATION_LENGTH = 60;

/**
 * Filesystem-safe form of a citation: "John 3:16-21" becomes "john-3-16-21".
 */
export function sanitizeCitation(citation: string): string {
  const cleaned = citation
    .toLowerCase()
    .replace(/[\s:|;,.]+/g, "-")
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");

  return cleaned.slice(0, MAX_CITATION_LENGTH).replace(/-$/, "") || "passage";
}

/** `<protocol>_<citation>_<YYYYMMDD>` */
export function baseSlug(protocolId: string, citation: string, date: Date): string {
  return `${protocolId}_${sanitizeCitation(citation)}_${compactDate(date)}`;
}

/** The nth candidate for a base slug: the base itself, then `-2`, `-3`, ... */
export function slugCandidate(base: string, attempt: number): string {
  return attempt <= 1 ? base : `${base}-${attempt}`;
}
