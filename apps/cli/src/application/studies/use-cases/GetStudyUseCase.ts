import { injectable, inject } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { IStudyRepository } from "../../../domain/studies/repositories/IStudyRepository";
import { StudyArtifact } from "../../../domain/studies/entities/StudyArtifact";
import { ValidationError } from "../../../shared/errors/InputErrors";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

/**
 * Get Study Use Case
 *
 * Look up one study by slug or by the path of its document
 */
@injectable()
export class GetStudyUseCase implements IUseCase<string, StudyArtifact> {
  constructor(
    @inject(TYPES.StudyRepository)
    private studyRepository: IStudyRepository,

    @inject(TYPES.Logger)
    private logger: ILogger,
  ) {}

  async execute(slugOrPath: string): Promise<StudyArtifact> {
    const key = slugOrPath.trim();
    if (key === "") {
      throw new ValidationError("Study slug or path is required", "slug");
    }

    const artifact = await this.studyRepository.get(key);
    this.logger.debug("Study loaded", { slug: artifact.slug });
    return artifact;
  }
}
