/**
 * Dependency Injection Types/Tokens
 *
 * All injectable dependencies are registered here using symbols
 * to avoid string-based injection which is error-prone
 */

export const TYPES = {
  // Configuration
  Config: Symbol.for("Config"),
  Clock: Symbol.for("Clock"),

  // Logging
  Logger: Symbol.for("Logger"),

  // Protocols
  ProtocolRegistry: Symbol.for("ProtocolRegistry"),
  CollisionVectors: Symbol.for("CollisionVectors"),

  // Text sources
  HtmlFetcher: Symbol.for("HtmlFetcher"),
  PassageSource: Symbol.for("PassageSource"),
  CalendarSource: Symbol.for("CalendarSource"),

  // Generation
  ChatCompletions: Symbol.for("ChatCompletions"),
  GenerationBackend: Symbol.for("GenerationBackend"),

  // Repositories
  StudyRepository: Symbol.for("StudyRepository"),

  // Domain Services
  ReferenceResolver: Symbol.for("ReferenceResolver"),
  PromptRenderer: Symbol.for("PromptRenderer"),
  GenerationClient: Symbol.for("GenerationClient"),
  ArtifactValidator: Symbol.for("ArtifactValidator"),
  ArtifactWriter: Symbol.for("ArtifactWriter"),

  // Use Cases
  GenerateStudyUseCase: Symbol.for("GenerateStudyUseCase"),
  ListStudiesUseCase: Symbol.for("ListStudiesUseCase"),
  GetStudyUseCase: Symbol.for("GetStudyUseCase"),
} as const;

export type DITypes = typeof TYPES;
