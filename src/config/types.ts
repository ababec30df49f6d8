export type Provider = "google";

/** Longest timeout a Node timer can hold, in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export interface AppConfig {
  provider: Provider;
  /** Model used when the agent runs with visual perception (computer use). */
  cuaModel: string;
  /** Model used for DOM-only agent runs. */
  agentModel: string;
  apiKey: string;
  headless: boolean;
  useVision: boolean;
  maxRetries: number;
  stepTimeoutMs: number;
  interventionTimeoutMs: number;
  /** Consecutive unanswered interventions on one step before the run ends. */
  maxUnattendedFallbacks: number;
  dataDir: string;
  screenshotsDir: string;
  port: number;
  viewport: { width: number; height: number };
}
