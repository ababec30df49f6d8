import type { InterventionRecord } from "../intervention/types.js";

/** Outcome of one physical attempt at a step. */
export interface StepResult {
  stepNumber: number;
  success: boolean;
  durationMs: number;
  errorMessage?: string;
  screenshotPath?: string;
  interventionUsed: boolean;
  interventionDetails?: string;
  agentOutput?: string;
}

/** One agent invocation, as seen from the outside. */
export interface HistoryEntry {
  stepNumber: number;
  task: string;
  output?: string;
  error?: string;
  timestamp: string;
}

export interface RunResult {
  testName: string;
  /** AND over every recorded attempt; true when nothing was attempted. */
  success: boolean;
  totalTimeMs: number;
  stepResults: StepResult[];
  finalMessage: string;
  screenshotsDir?: string;
  history?: HistoryEntry[];
  interventions: readonly InterventionRecord[];
}
