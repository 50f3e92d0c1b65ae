/**
 * Configuration interface
 *
 * Loaded once at process start and read-only afterwards. Implementations can
 * come from environment variables, files, or tests.
 */

export interface IConfig {
  readonly nodeEnv: string;

  // Generation backend
  readonly openAiApiKey: string;
  readonly openAiModel: string;
  readonly openAiBaseUrl: string | undefined;
  readonly generationTimeoutMs: number;

  // Text sources
  readonly defaultTranslation: string;
  readonly fetchTimeoutMs: number;

  // Studies
  readonly defaultEngine: string;
  readonly outputDirectory: string;
  readonly lengthTolerance: number;

  hasApiKey(): boolean;

  // Validation
  validate(): void;
}
