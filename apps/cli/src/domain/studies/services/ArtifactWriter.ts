import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import type { ILogger } from "../../../infrastructure/logging/ILogger";
import type { IStudyRepository } from "../repositories/IStudyRepository";
import { Clock, isoDate } from "../../../shared/clock";
import { Protocol } from "../../protocols/Protocol";
import { CollisionVectors } from "../../protocols/CollisionVectors";
import { ScriptureReference } from "../../scripture/ScriptureReference";
import { StudyPreferences } from "../value-objects/StudyPreferences";
import { baseSlug } from "../value-objects/Slug";
import { GenerationResult } from "../entities/Generation";
import { StudyArtifact, StudyMetadataDraft } from "../entities/StudyArtifact";
import { ValidatedText } from "./ArtifactValidator";
import { studyTitle } from "./StudyDocument";

export interface WriteContext {
  result?: GenerationResult;
  collisionVectors?: CollisionVectors;
  preferences?: StudyPreferences;
}

/**
 * Artifact Writer
 *
 * Assembles the document and its metadata from validated text and hands
 * them to the repository, which claims a unique slug.
 */
@injectable()
export class ArtifactWriter {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.StudyRepository) private readonly repository: IStudyRepository,
    @inject(TYPES.Clock) private readonly clock: Clock,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ component: "ArtifactWriter" });
  }

  async write(
    validated: ValidatedText,
    reference: ScriptureReference,
    protocol: Protocol,
    context: WriteContext = {},
  ): Promise<StudyArtifact> {
    const now = this.clock();
    const body = validated.text;
    const wordCount = validated.wordCount;
    const warning = validated.lengthWarning;

    const metadata: StudyMetadataDraft = {
      engine: protocol.id,
      reference: reference.citation,
      date: isoDate(now),
      word_count: wordCount,
      created_at: now.toISOString(),
      protocol_version: protocol.version,
      source: reference.source,
      model: context.result?.model,
      correlation_id: context.result?.correlationId,
      length_out_of_range: warning !== undefined,
      length_warning: warning && {
        word_count: warning.wordCount,
        allowed_min: warning.allowed.min,
        allowed_max: warning.allowed.max,
        nominal_min: warning.nominal.min,
        nominal_max: warning.nominal.max,
      },
      collision_vectors: context.collisionVectors && { ...context.collisionVectors },
      preferences:
        context.preferences && !context.preferences.isEmpty()
          ? context.preferences.toJSON()
          : undefined,
    };

    const artifact = await this.repository.create({
      baseSlug: baseSlug(protocol.id, reference.citation, now),
      frontmatter: {
        engine: protocol.id,
        reference: reference.citation,
        date: metadata.date,
        word_count: wordCount,
      },
      title: studyTitle(protocol.displayName, reference.citation),
      body,
      metadata,
    });

    this.logger.info("Study saved", {
      slug: artifact.slug,
      filePath: artifact.filePath,
      wordCount,
      lengthOutOfRange: metadata.length_out_of_range,
    });

    return artifact;
  }
}
