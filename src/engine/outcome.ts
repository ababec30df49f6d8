import { isAbortError, withDeadline } from "../abort.js";
import { StepTimeoutError, errorMessage } from "../errors.js";

export type StepOutcome =
  | { kind: "success"; output: string }
  | { kind: "timeout"; error: StepTimeoutError; settled: Promise<void> }
  | { kind: "error"; error: unknown };

/**
 * Run one agent invocation under the step deadline and fold whatever happens
 * into a StepOutcome. Never rejects. A timeout outcome carries `settled`, which
 * resolves once the abandoned invocation has actually stopped.
 */
export async function runStepOperation(
  operation: (signal: AbortSignal) => Promise<string>,
  stepNumber: number,
  timeoutMs: number,
  onLateError?: (err: unknown) => void,
): Promise<StepOutcome> {
  let settled: Promise<void> = Promise.resolve();
  try {
    const output = await withDeadline(operation, {
      timeoutMs,
      onExpire: () =>
        new StepTimeoutError(
          `Step ${stepNumber} timed out after ${Math.round(timeoutMs / 1000)}s`,
          timeoutMs,
        ),
      onLateError: (err) => {
        // rejections caused by our own abort are not reported
        if (err instanceof StepTimeoutError || isAbortError(err)) return;
        onLateError?.(err);
      },
      onAbandoned: (abandoned) => {
        settled = abandoned;
      },
    });
    return { kind: "success", output };
  } catch (err) {
    if (err instanceof StepTimeoutError) {
      return { kind: "timeout", error: err, settled };
    }
    return { kind: "error", error: err };
  }
}

export function outcomeError(outcome: StepOutcome): string | undefined {
  switch (outcome.kind) {
    case "success":
      return undefined;
    case "timeout":
      return outcome.error.message;
    case "error":
      return errorMessage(outcome.error);
  }
}
