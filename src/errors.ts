/**
 * Error taxonomy for a plan run. Only `SessionCreationError` is allowed to
 * abort a run; the step and intervention errors are converted into results
 * before they leave the engine loop.
 */

export class StepTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = "StepTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class StepExecutionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StepExecutionError";
  }
}

export class SessionCreationError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Could not create a browser session after ${attempts} attempt(s)${detail}`, { cause });
    this.name = "SessionCreationError";
    this.attempts = attempts;
  }
}

export class InterventionTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Intervention timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = "InterventionTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class PlanValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanValidationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
