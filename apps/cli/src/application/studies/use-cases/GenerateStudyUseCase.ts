import { injectable, inject } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { GenerateStudyDto, GeneratedStudyDto } from "../dto/GenerateStudyDto";
import { ProtocolRegistry } from "../../../domain/protocols/ProtocolRegistry";
import {
  CollisionVectorCatalog,
  CollisionVectors,
} from "../../../domain/protocols/CollisionVectors";
import { ReferenceResolver } from "../../../domain/scripture/ReferenceResolver";
import { PromptRenderer } from "../../../domain/studies/services/PromptRenderer";
import { GenerationClient } from "../../../domain/studies/services/GenerationClient";
import { ArtifactValidator } from "../../../domain/studies/services/ArtifactValidator";
import { ArtifactWriter } from "../../../domain/studies/services/ArtifactWriter";
import { withLengthPreference } from "../../../domain/studies/value-objects/StudyPreferences";
import { ValidationError } from "../../../shared/errors/InputErrors";
import { AppError } from "../../../shared/errors/AppError";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

/**
 * Generate Study Use Case
 *
 * The whole pipeline for one study: resolve the text, render the protocol,
 * generate, validate, then persist. Stages run strictly in sequence and the
 * first failure stops the run; nothing is written unless validation passes.
 */
@injectable()
export class GenerateStudyUseCase
  implements IUseCase<GenerateStudyDto, GeneratedStudyDto>
{
  constructor(
    @inject(TYPES.ProtocolRegistry)
    private registry: ProtocolRegistry,

    @inject(TYPES.CollisionVectors)
    private vectors: CollisionVectorCatalog,

    @inject(TYPES.ReferenceResolver)
    private resolver: ReferenceResolver,

    @inject(TYPES.PromptRenderer)
    private renderer: PromptRenderer,

    @inject(TYPES.GenerationClient)
    private client: GenerationClient,

    @inject(TYPES.ArtifactValidator)
    private validator: ArtifactValidator,

    @inject(TYPES.ArtifactWriter)
    private writer: ArtifactWriter,

    @inject(TYPES.Logger)
    private logger: ILogger,
  ) {}

  async execute(dto: GenerateStudyDto): Promise<GeneratedStudyDto> {
    // 1. Fail fast on the protocol before touching any source
    const protocol = this.registry.get(dto.protocolId);
    const log = this.logger.child({ protocol: protocol.id, input: dto.input.kind });

    if (dto.collisionVector !== undefined && !protocol.usesCollisionVectors) {
      throw new ValidationError(
        `--vector only applies to protocols that use collision vectors, not "${protocol.id}"`,
        "vector",
      );
    }

    try {
      // 2. Resolve
      const reference = await this.resolver.resolveOne(dto.input);
      log.info("Reference resolved", {
        citation: reference.citation,
        source: reference.source,
        words: reference.wordCount(),
      });

      // 3. Render
      const collisionVectors: CollisionVectors | undefined = protocol.usesCollisionVectors
        ? this.vectors.pick(dto.collisionVector)
        : undefined;
      const request = this.renderer.render(protocol, reference, {
        preferences: dto.preferences,
        collisionVectors,
      });

      // 4. Generate
      const result = await this.client.generate(request, { signal: dto.signal });

      // 5. Validate against the same contract the prompt asked for
      const verdict = this.validator.validate(
        result,
        withLengthPreference(protocol, dto.preferences),
      );
      if (!verdict.ok) {
        log.warn("Generated study failed validation; nothing was saved", {
          correlationId: request.correlationId,
          missing: verdict.error.missing,
          outOfOrder: verdict.error.outOfOrder,
        });
        throw verdict.error;
      }

      const warning = verdict.value.lengthWarning;
      if (warning) {
        log.warn("Study length is outside the protocol range", {
          wordCount: warning.wordCount,
          allowedMin: warning.allowed.min,
          allowedMax: warning.allowed.max,
        });
      }

      // 6. Persist
      const artifact = await this.writer.write(verdict.value, reference, protocol, {
        result,
        collisionVectors,
        preferences: dto.preferences,
      });

      return new GeneratedStudyDto(artifact, warning, collisionVectors);
    } catch (error) {
      if (!(error instanceof AppError) || !error.isOperational) {
        log.error(
          "Study generation failed unexpectedly",
          error instanceof Error ? error : undefined,
        );
      }
      throw error;
    }
  }
}
