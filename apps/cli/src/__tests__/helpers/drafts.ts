import type { StudyDraft } from "../../domain/studies/entities/StudyArtifact";

/** A ready-to-store draft for repository tests */
export function studyDraft(
  overrides: { baseSlug?: string; reference?: string; createdAt?: string; body?: string } = {},
): StudyDraft {
  const reference = overrides.reference ?? "John 3:16-21";
  const body = overrides.body ?? "## Alpha\n\nThe lamp was lit.";
  return {
    baseSlug: overrides.baseSlug ?? "threshold_john-3-16-21_20261019",
    frontmatter: { engine: "threshold", reference, date: "2026-10-19", word_count: 6 },
    title: `Threshold Study: ${reference}`,
    body,
    metadata: {
      engine: "threshold",
      reference,
      date: "2026-10-19",
      word_count: 6,
      created_at: overrides.createdAt ?? "2026-10-19T09:00:00.000Z",
      protocol_version: "9.9.9",
      source: "NRSVUE",
      length_out_of_range: false,
    },
  };
}
