import type { SessionHandle } from "../session/types.js";

export interface InvokeOptions {
  useVision: boolean;
  /** Aborted when the step deadline passes; the agent should stop acting. */
  signal: AbortSignal;
}

/**
 * The autonomous actor that carries out one step's task against the shared
 * browser. Resolves with the agent's textual account of what it did, rejects
 * when the step could not be completed.
 */
export interface ExecutionAgent {
  invoke(task: string, opts: InvokeOptions): Promise<string>;
}

/** Binds a new agent to a session. Called again after a session is recreated. */
export type AgentFactory = (session: SessionHandle) => ExecutionAgent;
