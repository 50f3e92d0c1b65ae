import type { ResolveInput } from "../../../domain/scripture/ReferenceResolver";
import type { StudyPreferences } from "../../../domain/studies/value-objects/StudyPreferences";
import type { StudyArtifact } from "../../../domain/studies/entities/StudyArtifact";
import type { LengthOutOfRange } from "../../../domain/studies/services/ArtifactValidator";
import type { CollisionVectors } from "../../../domain/protocols/CollisionVectors";

/**
 * Generate Study DTO
 *
 * One study request: which protocol, where the text comes from, and the
 * reader's optional customizations.
 */
export class GenerateStudyDto {
  constructor(
    public readonly protocolId: string,
    public readonly input: ResolveInput,
    public readonly preferences?: StudyPreferences,
    public readonly collisionVector?: string,
    public readonly signal?: AbortSignal,
  ) {}
}

/**
 * Generated Study DTO (Response)
 */
export class GeneratedStudyDto {
  constructor(
    public readonly artifact: StudyArtifact,
    public readonly lengthWarning?: LengthOutOfRange,
    public readonly collisionVectors?: CollisionVectors,
  ) {}
}
