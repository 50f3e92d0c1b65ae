import { EnvConfig } from "../../shared/config/EnvConfig";

/** EnvConfig over a private env, never the process's own */
export function testConfig(overrides: Record<string, string> = {}): EnvConfig {
  return new EnvConfig({
    NODE_ENV: "test",
    OPENAI_API_KEY: "test-openai-key",
    OUTPUT_DIRECTORY: "test-outputs",
    ...overrides,
  });
}
