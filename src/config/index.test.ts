import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { loadConfig } from "./index.js";

const base = { GOOGLE_GENERATIVE_AI_API_KEY: "test-secret" };

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(base);
    expect(config).toMatchObject({
      apiKey: "test-secret",
      maxRetries: 3,
      stepTimeoutMs: 300_000,
      interventionTimeoutMs: 600_000,
      maxUnattendedFallbacks: 3,
      useVision: true,
      headless: false,
      dataDir: "./data",
      screenshotsDir: "data/screenshots",
      port: 3100,
      viewport: { width: 1288, height: 711 },
    });
  });

  it("reads numbers and flags from the environment", () => {
    const config = loadConfig({
      ...base,
      MAX_RETRIES: "0",
      STEP_TIMEOUT: "45",
      INTERVENTION_TIMEOUT: "1",
      USE_VISION: "false",
      HEADLESS: "1",
      SCREENSHOTS_DIR: "/tmp/shots",
    });
    expect(config.maxRetries).toBe(0);
    expect(config.stepTimeoutMs).toBe(45_000);
    expect(config.interventionTimeoutMs).toBe(1000);
    expect(config.useVision).toBe(false);
    expect(config.headless).toBe(true);
    expect(config.screenshotsDir).toBe("/tmp/shots");
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ ...base, MAX_RETRIES: "" }).maxRetries).toBe(3);
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfig({ ...base, MAX_RETRIES: "5" }, { maxRetries: 1, useVision: undefined });
    expect(config.maxRetries).toBe(1);
    expect(config.useVision).toBe(true);
  });

  it("lists every invalid field", () => {
    let caught: unknown;
    try {
      loadConfig({ MAX_RETRIES: "-1", HEADLESS: "maybe" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toContain("GOOGLE_GENERATIVE_AI_API_KEY: Required");
    expect(issues.some((i) => i.startsWith("MAX_RETRIES:"))).toBe(true);
    expect(issues.some((i) => i.startsWith("HEADLESS:"))).toBe(true);
  });

  it("caps timeouts at what a timer can hold", () => {
    expect(loadConfig({ ...base, STEP_TIMEOUT: "2147483" }).stepTimeoutMs).toBe(2_147_483_000);
    expect(() => loadConfig({ ...base, STEP_TIMEOUT: "2147484" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...base, INTERVENTION_TIMEOUT: "3000000" })).toThrow(ConfigError);
  });
});
