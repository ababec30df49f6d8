import { describe, expect, it, vi } from "vitest";
import { StepExecutionError, StepTimeoutError } from "../errors.js";
import { outcomeError, runStepOperation } from "./outcome.js";

describe("runStepOperation", () => {
  it("wraps the agent output in a success outcome", async () => {
    const outcome = await runStepOperation(async () => "clicked", 1, 1000);
    expect(outcome).toEqual({ kind: "success", output: "clicked" });
    expect(outcomeError(outcome)).toBeUndefined();
  });

  it("turns an expired deadline into a timeout outcome", async () => {
    const outcome = await runStepOperation(() => new Promise<string>(() => {}), 4, 20);
    expect(outcome.kind).toBe("timeout");
    expect(outcome.kind === "timeout" && outcome.error).toBeInstanceOf(StepTimeoutError);
    expect(outcomeError(outcome)).toBe("Step 4 timed out after 0s");
  });

  it("turns a thrown error into an error outcome", async () => {
    const outcome = await runStepOperation(async () => {
      throw new StepExecutionError("Agent did not complete the step");
    }, 2, 1000);
    expect(outcome.kind).toBe("error");
    expect(outcomeError(outcome)).toBe("Agent did not complete the step");
  });

  it("reports late failures of an abandoned call but not its cancellation", async () => {
    const onLateError = vi.fn();
    await runStepOperation(
      (signal) =>
        new Promise<string>((_, reject) => {
          signal.addEventListener("abort", () => reject(signal.reason), { once: true });
        }),
      1,
      10,
      onLateError,
    );
    await runStepOperation(
      () => new Promise<string>((_, reject) => setTimeout(() => reject(new Error("page crashed")), 30)),
      2,
      10,
      onLateError,
    );
    await vi.waitFor(() => expect(onLateError).toHaveBeenCalledTimes(1));
    expect(onLateError).toHaveBeenCalledWith(new Error("page crashed"));
  });
});
