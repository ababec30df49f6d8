import type { OutputSink } from "../output-sink.js";
import type { HistoryEntry, RunResult, StepResult } from "./types.js";
import type { InterventionRecord } from "../intervention/types.js";

export interface AggregateInput {
  testName: string;
  stepResults: readonly StepResult[];
  startedAt: number;
  finishedAt: number;
  /** Overrides the generated message, e.g. when the run was stopped early. */
  finalMessage?: string;
  /** The run ended before the plan could be worked through, e.g. no browser. */
  aborted?: boolean;
  screenshotsDir?: string;
  history?: readonly HistoryEntry[];
  interventions?: readonly InterventionRecord[];
}

export function aggregateRun(input: AggregateInput): RunResult {
  const stepResults = [...input.stepResults];
  const success = !input.aborted && stepResults.every((r) => r.success);
  const failed = stepResults.filter((r) => !r.success).length;

  const finalMessage =
    input.finalMessage ??
    (success
      ? `Test completed - all ${stepResults.length} attempt(s) passed`
      : `Test failed - ${failed} of ${stepResults.length} attempt(s) failed`);

  return {
    testName: input.testName,
    success,
    totalTimeMs: Math.max(0, input.finishedAt - input.startedAt),
    stepResults,
    finalMessage,
    screenshotsDir: input.screenshotsDir,
    history: input.history ? [...input.history] : undefined,
    interventions: input.interventions ? [...input.interventions] : [],
  };
}

export function buildSummaryMessage(result: RunResult): string {
  const passed = result.stepResults.filter((r) => r.success).length;
  const failed = result.stepResults.length - passed;
  const interventions = result.stepResults.filter((r) => r.interventionUsed).length;
  const steps = new Set(result.stepResults.map((r) => r.stepNumber)).size;

  const lines = [
    `**${result.success ? "PASS" : "FAIL"}** - ${result.testName}`,
    "",
    `Steps attempted: ${steps} | Attempts: ${result.stepResults.length} (${passed} passed, ${failed} failed)`,
    `Interventions: ${interventions}`,
    `Duration: ${(result.totalTimeMs / 1000).toFixed(1)}s`,
    "",
    result.finalMessage,
  ];
  return lines.join("\n");
}

/** Per-attempt trail followed by the verdict. */
export function printRunSummary(result: RunResult, sink: OutputSink): void {
  sink.separator();
  sink.log(`Test: ${result.testName}`);
  for (const r of result.stepResults) {
    const mark = r.success ? "PASS" : "FAIL";
    const extra = r.success ? "" : ` - ${r.errorMessage ?? "unknown error"}`;
    const intervention = r.interventionUsed ? ` [intervention: ${r.interventionDetails ?? "yes"}]` : "";
    sink.log(`  step ${r.stepNumber}: ${mark} (${(r.durationMs / 1000).toFixed(1)}s)${extra}${intervention}`);
  }
  sink.separator();
  const line = `${result.success ? "PASS" : "FAIL"}: ${result.finalMessage}`;
  if (result.success) {
    sink.success(line);
  } else {
    sink.error(line);
  }
}
