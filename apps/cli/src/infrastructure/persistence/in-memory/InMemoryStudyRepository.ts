import { IStudyRepository } from "../../../domain/studies/repositories/IStudyRepository";
import {
  StudyArtifact,
  StudyDraft,
  StudyMetadata,
} from "../../../domain/studies/entities/StudyArtifact";
import { slugCandidate } from "../../../domain/studies/value-objects/Slug";
import { formatDocument } from "../../../domain/studies/services/StudyDocument";
import { ArtifactNotFoundError } from "../../../shared/errors/PipelineErrors";
import { sameReference, newestFirst } from "../studyOrdering";

/**
 * In-memory implementation of IStudyRepository for testing
 *
 * Stores studies in a Map keyed by slug, with the same slug suffixing as the
 * filesystem repository
 */
export class InMemoryStudyRepository implements IStudyRepository {
  private studies: Map<string, StudyArtifact> = new Map();

  async create(draft: StudyDraft): Promise<StudyArtifact> {
    let attempt = 1;
    while (this.studies.has(slugCandidate(draft.baseSlug, attempt))) {
      attempt++;
    }

    const slug = slugCandidate(draft.baseSlug, attempt);
    const filePath = `memory/${slug}.md`;
    const artifact: StudyArtifact = {
      slug,
      filePath,
      metadata: { ...draft.metadata, slug, file_path: filePath },
      frontmatter: draft.frontmatter,
      title: draft.title,
      body: draft.body.trim(),
      document: formatDocument(draft.frontmatter, draft.title, draft.body),
    };

    this.studies.set(slug, artifact);
    return artifact;
  }

  async list(): Promise<StudyMetadata[]> {
    return Array.from(this.studies.values())
      .map((study) => study.metadata)
      .sort(newestFirst);
  }

  async get(slugOrPath: string): Promise<StudyArtifact> {
    const study =
      this.studies.get(slugOrPath) ??
      Array.from(this.studies.values()).find((s) => s.filePath === slugOrPath);

    if (!study) {
      throw new ArtifactNotFoundError(slugOrPath);
    }
    return study;
  }

  async findByReference(citation: string): Promise<StudyMetadata[]> {
    return (await this.list()).filter((m) => sameReference(m.reference, citation));
  }

  // Test helper methods
  clear(): void {
    this.studies.clear();
  }

  count(): number {
    return this.studies.size;
  }
}
