import {
  StudyArtifact,
  StudyDraft,
  StudyMetadata,
} from "../entities/StudyArtifact";

/**
 * Study Repository Interface
 *
 * Studies are append-only: a draft is written once under a fresh slug and
 * never overwritten.
 */
export interface IStudyRepository {
  /**
   * Claim a slug derived from `draft.baseSlug` (suffixing `-2`, `-3`, ... on
   * collision) and write the document with its metadata. Either both are
   * visible afterwards or neither is.
   */
  create(draft: StudyDraft): Promise<StudyArtifact>;

  /** All studies, newest first. Records without a document are skipped. */
  list(): Promise<StudyMetadata[]>;

  /** @throws ArtifactNotFoundError */
  get(slugOrPath: string): Promise<StudyArtifact>;

  findByReference(citation: string): Promise<StudyMetadata[]>;
}
