import { injectable, inject } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { StudySummaryDto } from "../dto/StudySummaryDto";
import { IStudyRepository } from "../../../domain/studies/repositories/IStudyRepository";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

export interface ListStudiesRequest {
  /** Only studies of this citation */
  reference?: string;
}

/**
 * List Studies Use Case
 *
 * Newest first
 */
@injectable()
export class ListStudiesUseCase
  implements IUseCase<ListStudiesRequest, StudySummaryDto[]>
{
  constructor(
    @inject(TYPES.StudyRepository)
    private studyRepository: IStudyRepository,

    @inject(TYPES.Logger)
    private logger: ILogger,
  ) {}

  async execute(request: ListStudiesRequest = {}): Promise<StudySummaryDto[]> {
    const records = request.reference
      ? await this.studyRepository.findByReference(request.reference)
      : await this.studyRepository.list();

    this.logger.debug("Listed studies", {
      count: records.length,
      reference: request.reference,
    });

    return records.map((record) => StudySummaryDto.fromMetadata(record));
  }
}
