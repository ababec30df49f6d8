import type { StepStatus } from "./output-sink.js";
import type { InterventionContext } from "./intervention/types.js";
import type { RunResult } from "./report/types.js";

// ── WebSocket Protocol ─────────────────────────────────────────────

export type WSMessageType =
  | "run_plan"
  | "intervention_response"
  | "run_started"
  | "run_result"
  | "step_update"
  | "intervention_required"
  | "stream_chunk"
  | "error"
  | "log";

export interface WSMessage {
  type: WSMessageType;
  id?: string;
  payload: unknown;
}

// ── Client -> Server Messages ──────────────────────────────────────

/** Either a plan object or a path to a plan file the server can read. */
export interface RunPlanPayload {
  plan?: unknown;
  planPath?: string;
}

// ── Server -> Client Messages ──────────────────────────────────────

export interface RunStartedPayload {
  testName: string;
  totalSteps: number;
}

export interface StepUpdatePayload {
  stepNumber: number;
  total: number;
  title: string;
  status: StepStatus;
}

export interface InterventionRequiredPayload {
  context: InterventionContext;
  timeoutMs?: number;
}

export type RunResultPayload = RunResult;

export interface LogPayload {
  level: "info" | "success" | "warn" | "error" | "agent";
  message: string;
}

export interface StreamChunkPayload {
  text: string;
}

export interface ErrorPayload {
  message: string;
  code?: string;
}
