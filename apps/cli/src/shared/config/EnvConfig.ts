import { IConfig } from "./IConfig";
import { ConfigurationError } from "../errors/InputErrors";

/**
 * Environment-based configuration implementation
 *
 * Reads configuration from process.env (after dotenv has loaded .env) and
 * validates on construction. The API key is optional here: commands that
 * never reach the backend (list, show, config) work without it.
 */
export class EnvConfig implements IConfig {
  readonly nodeEnv: string;

  readonly openAiApiKey: string;
  readonly openAiModel: string;
  readonly openAiBaseUrl: string | undefined;
  readonly generationTimeoutMs: number;

  readonly defaultTranslation: string;
  readonly fetchTimeoutMs: number;

  readonly defaultEngine: string;
  readonly outputDirectory: string;
  readonly lengthTolerance: number;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.nodeEnv = env.NODE_ENV || "development";

    this.openAiApiKey = env.OPENAI_API_KEY || "";
    this.openAiModel = env.OPENAI_MODEL || "gpt-4o";
    this.openAiBaseUrl = env.OPENAI_BASE_URL || undefined;
    this.generationTimeoutMs = parseInt(
      env.GENERATION_TIMEOUT_MS || "300000",
      10,
    );

    this.defaultTranslation = env.DEFAULT_TRANSLATION || "NRSVue";
    this.fetchTimeoutMs = parseInt(env.FETCH_TIMEOUT_MS || "10000", 10);

    this.defaultEngine = env.DEFAULT_ENGINE || "threshold";
    this.outputDirectory = env.OUTPUT_DIRECTORY || "outputs";
    this.lengthTolerance = parseFloat(env.LENGTH_TOLERANCE || "0.1");

    this.validate();
  }

  hasApiKey(): boolean {
    return this.openAiApiKey.trim() !== "";
  }

  validate(): void {
    const timeouts = [
      { name: "GENERATION_TIMEOUT_MS", value: this.generationTimeoutMs },
      { name: "FETCH_TIMEOUT_MS", value: this.fetchTimeoutMs },
    ];

    const invalid = timeouts.filter(
      (t) => !Number.isInteger(t.value) || t.value <= 0,
    );

    if (invalid.length > 0) {
      throw new ConfigurationError(
        `Timeouts must be positive integers (milliseconds): ${invalid.map((t) => t.name).join(", ")}`,
      );
    }

    if (
      Number.isNaN(this.lengthTolerance) ||
      this.lengthTolerance < 0 ||
      this.lengthTolerance >= 1
    ) {
      throw new ConfigurationError(
        `Invalid LENGTH_TOLERANCE: must be a fraction between 0 and 1, got ${this.lengthTolerance}`,
      );
    }

    if (this.outputDirectory.trim() === "") {
      throw new ConfigurationError("OUTPUT_DIRECTORY must not be empty");
    }
  }
}
