import "dotenv/config";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { MAX_TIMEOUT_SECONDS } from "./types.js";
import type { AppConfig } from "./types.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const EnvSchema = z.object({
  GOOGLE_GENERATIVE_AI_API_KEY: z.string().min(1),
  CUA_MODEL: z.string().default("google/gemini-2.5-computer-use-preview-10-2025"),
  AGENT_MODEL: z.string().default("google/gemini-2.5-flash"),
  HEADLESS: booleanFlag.default("false"),
  USE_VISION: booleanFlag.default("true"),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  STEP_TIMEOUT: z.coerce.number().positive().max(MAX_TIMEOUT_SECONDS).default(300),
  INTERVENTION_TIMEOUT: z.coerce.number().positive().max(MAX_TIMEOUT_SECONDS).default(600),
  MAX_UNATTENDED_FALLBACKS: z.coerce.number().int().min(1).default(3),
  DATA_DIR: z.string().default("./data"),
  SCREENSHOTS_DIR: z.string().optional(),
  AGENT_PORT: z.coerce.number().int().min(0).max(65535).default(3100),
});

export type ConfigOverrides = Partial<
  Pick<
    AppConfig,
    "maxRetries" | "stepTimeoutMs" | "interventionTimeoutMs" | "useVision" | "headless" | "screenshotsDir"
  >
>;

/**
 * Reads settings from the environment (and `.env`). Empty variables count as
 * unset. CLI flags arrive as `overrides` and win over the environment.
 */
export function loadConfig(
  source: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): AppConfig {
  const env = Object.fromEntries(
    Object.entries(source).filter(([, v]) => v !== undefined && v !== ""),
  );

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const e = parsed.data;

  const config: AppConfig = {
    provider: "google",
    cuaModel: e.CUA_MODEL,
    agentModel: e.AGENT_MODEL,
    apiKey: e.GOOGLE_GENERATIVE_AI_API_KEY,
    headless: e.HEADLESS,
    useVision: e.USE_VISION,
    maxRetries: e.MAX_RETRIES,
    stepTimeoutMs: e.STEP_TIMEOUT * 1000,
    interventionTimeoutMs: e.INTERVENTION_TIMEOUT * 1000,
    maxUnattendedFallbacks: e.MAX_UNATTENDED_FALLBACKS,
    dataDir: e.DATA_DIR,
    screenshotsDir: e.SCREENSHOTS_DIR ?? path.join(e.DATA_DIR, "screenshots"),
    port: e.AGENT_PORT,
    viewport: { width: 1288, height: 711 },
  };

  return { ...config, ...stripUndefined(overrides) };
}

function stripUndefined(overrides: ConfigOverrides): ConfigOverrides {
  const out: ConfigOverrides = {};
  if (overrides.maxRetries !== undefined) out.maxRetries = overrides.maxRetries;
  if (overrides.stepTimeoutMs !== undefined) out.stepTimeoutMs = overrides.stepTimeoutMs;
  if (overrides.interventionTimeoutMs !== undefined) out.interventionTimeoutMs = overrides.interventionTimeoutMs;
  if (overrides.useVision !== undefined) out.useVision = overrides.useVision;
  if (overrides.headless !== undefined) out.headless = overrides.headless;
  if (overrides.screenshotsDir !== undefined) out.screenshotsDir = overrides.screenshotsDir;
  return out;
}

export type { AppConfig } from "./types.js";
