import type { StudyMetadata } from "../../domain/studies/entities/StudyArtifact";

/** Sort comparator: latest created_at first, then slug descending */
export function newestFirst(a: StudyMetadata, b: StudyMetadata): number {
  if (a.created_at !== b.created_at) {
    return a.created_at < b.created_at ? 1 : -1;
  }
  return a.slug < b.slug ? 1 : a.slug > b.slug ? -1 : 0;
}

const normalize = (citation: string): string =>
  citation.replace(/\s+/g, " ").trim().toLowerCase();

export function sameReference(stored: string, wanted: string): boolean {
  return normalize(stored) === normalize(wanted);
}
