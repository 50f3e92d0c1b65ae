import { describe, it, expect } from "@jest/globals";
import { EnvConfig } from "../EnvConfig";
import { ConfigurationError } from "../../errors/InputErrors";

describe("EnvConfig", () => {
  it("should apply defaults for unset variables", () => {
    const config = new EnvConfig({});

    expect(config.hasApiKey()).toBe(false);
    expect(config.openAiModel).toBe("gpt-4o");
    expect(config.openAiBaseUrl).toBeUndefined();
    expect(config.generationTimeoutMs).toBe(300000);
    expect(config.fetchTimeoutMs).toBe(10000);
    expect(config.defaultTranslation).toBe("NRSVue");
    expect(config.defaultEngine).toBe("threshold");
    expect(config.outputDirectory).toBe("outputs");
    expect(config.lengthTolerance).toBe(0.1);
  });

  it("should read overrides from the environment", () => {
    const config = new EnvConfig({
      OPENAI_API_KEY: "test-openai-key",
      OPENAI_BASE_URL: "http://localhost:8080/v1",
      GENERATION_TIMEOUT_MS: "60000",
      DEFAULT_ENGINE: "collision",
      OUTPUT_DIRECTORY: "studies",
      LENGTH_TOLERANCE: "0.25",
    });

    expect(config.hasApiKey()).toBe(true);
    expect(config.openAiBaseUrl).toBe("http://localhost:8080/v1");
    expect(config.generationTimeoutMs).toBe(60000);
    expect(config.defaultEngine).toBe("collision");
    expect(config.outputDirectory).toBe("studies");
    expect(config.lengthTolerance).toBe(0.25);
  });

  it("should treat a blank API key as unset", () => {
    expect(new EnvConfig({ OPENAI_API_KEY: "   " }).hasApiKey()).toBe(false);
  });

  it("should reject timeouts that are not positive integers", () => {
    expect(() => new EnvConfig({ GENERATION_TIMEOUT_MS: "soon" })).toThrow(ConfigurationError);
    expect(() => new EnvConfig({ FETCH_TIMEOUT_MS: "-5" })).toThrow(
      "Timeouts must be positive integers (milliseconds): FETCH_TIMEOUT_MS",
    );
  });

  it("should reject a tolerance outside [0, 1)", () => {
    expect(() => new EnvConfig({ LENGTH_TOLERANCE: "1.5" })).toThrow(
      "Invalid LENGTH_TOLERANCE: must be a fraction between 0 and 1, got 1.5",
    );
    expect(() => new EnvConfig({ LENGTH_TOLERANCE: "lots" })).toThrow(ConfigurationError);
  });

  it("should reject a blank output directory", () => {
    expect(() => new EnvConfig({ OUTPUT_DIRECTORY: "  " })).toThrow(
      "OUTPUT_DIRECTORY must not be empty",
    );
  });
});
