import type { StudyMetadata } from "../../../domain/studies/entities/StudyArtifact";

/**
 * Study Summary DTO
 *
 * One row of the study listing
 */
export class StudySummaryDto {
  constructor(
    public readonly slug: string,
    public readonly engine: string,
    public readonly reference: string,
    public readonly date: string,
    public readonly wordCount: number,
    public readonly filePath: string,
    public readonly createdAt: string,
    public readonly lengthOutOfRange: boolean,
  ) {}

  static fromMetadata(metadata: StudyMetadata): StudySummaryDto {
    return new StudySummaryDto(
      metadata.slug,
      metadata.engine,
      metadata.reference,
      metadata.date,
      metadata.word_count,
      metadata.file_path,
      metadata.created_at,
      metadata.length_out_of_range,
    );
  }
}
