import { z } from "zod";
import { Frontmatter } from "../services/StudyDocument";

/**
 * Metadata record stored beside every study. Keys are snake_case so the
 * record reads the same as the document's frontmatter.
 */
export const studyMetadataSchema = z.object({
  engine: z.string().min(1),
  reference: z.string().min(1),
  date: z.string().min(1),
  word_count: z.number().int().nonnegative(),
  slug: z.string().min(1),
  file_path: z.string().min(1),
  created_at: z.string().min(1),
  protocol_version: z.string().optional(),
  source: z.string().optional(),
  model: z.string().optional(),
  correlation_id: z.string().optional(),
  length_out_of_range: z.boolean().default(false),
  length_warning: z
    .object({
      word_count: z.number(),
      allowed_min: z.number(),
      allowed_max: z.number(),
      nominal_min: z.number(),
      nominal_max: z.number(),
    })
    .optional(),
  collision_vectors: z.record(z.string()).optional(),
  preferences: z.record(z.union([z.string(), z.number()])).optional(),
});

export type StudyMetadata = z.infer<typeof studyMetadataSchema>;

/** Everything the writer knows before a slug has been claimed */
export type StudyMetadataDraft = Omit<StudyMetadata, "slug" | "file_path">;

export interface StudyDraft {
  readonly baseSlug: string;
  readonly frontmatter: Frontmatter;
  readonly title: string;
  readonly body: string;
  readonly metadata: StudyMetadataDraft;
}

/** A persisted study. Immutable once written. */
export interface StudyArtifact {
  readonly slug: string;
  readonly filePath: string;
  readonly metadata: StudyMetadata;
  readonly frontmatter: Frontmatter;
  readonly title: string;
  readonly body: string;
  readonly document: string;
}
