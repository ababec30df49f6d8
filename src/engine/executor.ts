import { buildStepTask } from "../agent/task-builder.js";
import type { AgentFactory, ExecutionAgent } from "../agent/types.js";
import { errorMessage } from "../errors.js";
import type { InterventionGateway } from "../intervention/gateway.js";
import type { InterventionContext, InterventionResponse } from "../intervention/types.js";
import type { OutputSink } from "../output-sink.js";
import { StepStateTable } from "../plan/state.js";
import type { TestPlan, TestStep } from "../plan/types.js";
import { aggregateRun } from "../report/aggregator.js";
import type { HistoryEntry, RunResult, StepResult } from "../report/types.js";
import type { SessionManager } from "../session/manager.js";
import type { SessionHandle } from "../session/types.js";
import { outcomeError, runStepOperation } from "./outcome.js";
import { captureStepScreenshot } from "./screenshots.js";

export type EngineState = "IDLE" | "RUNNING" | "ESCALATING" | "DONE";

export interface ExecutionEngineOptions {
  maxRetries: number;
  stepTimeoutMs: number;
  useVision: boolean;
  /** Consecutive unanswered interventions on one step before the run stops. */
  maxUnattendedFallbacks: number;
  /** How long to wait for a timed-out agent call to stop before moving on. Default 30s. */
  abandonedCallGraceMs?: number;
  /** Screenshots are skipped when unset. */
  screenshotsDir?: string;
  sink?: OutputSink;
  clock?: () => Date;
}

export interface ExecutionEngineDeps {
  sessions: SessionManager;
  gateway: InterventionGateway;
  createAgent: AgentFactory;
}

const DEFAULT_ABANDONED_CALL_GRACE_MS = 30_000;

type Transition =
  | { kind: "goto"; index: number }
  | { kind: "stop"; message: string };

interface RunContext {
  plan: TestPlan;
  state: StepStateTable;
  results: StepResult[];
  history: HistoryEntry[];
}

/**
 * Walks a plan one step at a time. A failed step is retried up to
 * `maxRetries` times, then handed to an operator through the gateway; the
 * operator's answer moves the program counter. The browser session is
 * shared by every step and closed once, when the run ends.
 */
export class ExecutionEngine {
  private _state: EngineState = "IDLE";
  private agent: ExecutionAgent | null = null;
  private agentSession: SessionHandle | null = null;
  private sessions: SessionManager;
  private gateway: InterventionGateway;
  private createAgent: AgentFactory;
  private opts: ExecutionEngineOptions;
  private clock: () => Date;

  constructor(deps: ExecutionEngineDeps, opts: ExecutionEngineOptions) {
    this.sessions = deps.sessions;
    this.gateway = deps.gateway;
    this.createAgent = deps.createAgent;
    this.opts = opts;
    this.clock = opts.clock ?? (() => new Date());
  }

  get state(): EngineState {
    return this._state;
  }

  async run(plan: TestPlan): Promise<RunResult> {
    const sink = this.opts.sink;
    const startedAt = this.clock().getTime();
    const firstIntervention = this.gateway.getHistory().length;
    const ctx: RunContext = {
      plan,
      state: new StepStateTable(),
      results: [],
      history: [],
    };
    const unsubscribe = this.sessions.onRelease((handle) => {
      if (handle === this.agentSession) {
        this.agent = null;
        this.agentSession = null;
      }
    });

    this._state = "RUNNING";
    sink?.info(`Running "${plan.testName}" (${plan.steps.length} steps, environment: ${plan.environment})`);

    let finalMessage: string | undefined;
    let aborted = false;
    let index = 0;
    try {
      while (index < plan.steps.length) {
        const step = plan.steps[index];

        let session: SessionHandle;
        try {
          session = await this.sessions.acquire();
        } catch (err) {
          aborted = true;
          finalMessage = `Test aborted: ${errorMessage(err)}`;
          sink?.error(finalMessage);
          break;
        }

        const result = await this.attempt(step, ctx, session);
        if (result.success) {
          ctx.results.push(result);
          index += 1;
          continue;
        }

        const stepState = ctx.state.get(step.stepNumber);
        if (stepState.retryCount < this.opts.maxRetries) {
          const retry = ctx.state.incrementRetry(step.stepNumber);
          ctx.results.push(result);
          sink?.testStep(step.stepNumber, plan.steps.length, step.title, "retry");
          sink?.warn(`Retrying step ${step.stepNumber} (${retry}/${this.opts.maxRetries})`);
          continue;
        }

        const { transition, details } = await this.escalate(step, ctx, result);
        ctx.results.push({ ...result, interventionUsed: true, interventionDetails: details });

        if (transition.kind === "stop") {
          finalMessage = transition.message;
          sink?.error(finalMessage);
          break;
        }
        index = transition.index;
      }
    } finally {
      unsubscribe();
      this._state = "DONE";
      await this.sessions.release();
    }

    return aggregateRun({
      testName: plan.testName,
      stepResults: ctx.results,
      startedAt,
      finishedAt: this.clock().getTime(),
      finalMessage,
      aborted,
      screenshotsDir: this.opts.screenshotsDir,
      history: ctx.history,
      interventions: this.gateway.getHistory().slice(firstIntervention),
    });
  }

  private async attempt(step: TestStep, ctx: RunContext, session: SessionHandle): Promise<StepResult> {
    const sink = this.opts.sink;
    const total = ctx.plan.steps.length;
    const task = buildStepTask(step, ctx.plan, ctx.state);
    sink?.testStep(step.stepNumber, total, step.title, "running");

    const startedAt = this.clock();
    const outcome = await runStepOperation(
      (signal) => this.agentFor(session).invoke(task, { useVision: this.opts.useVision, signal }),
      step.stepNumber,
      this.opts.stepTimeoutMs,
      (err) => sink?.warn(`Abandoned agent call for step ${step.stepNumber} failed: ${errorMessage(err)}`),
    );
    const finishedAt = this.clock();
    const durationMs = finishedAt.getTime() - startedAt.getTime();
    const failure = outcomeError(outcome);

    ctx.history.push({
      stepNumber: step.stepNumber,
      task,
      output: outcome.kind === "success" ? outcome.output : undefined,
      error: failure,
      timestamp: finishedAt.toISOString(),
    });

    const screenshot = this.opts.screenshotsDir
      ? await captureStepScreenshot(
          session,
          this.opts.screenshotsDir,
          step.stepNumber,
          finishedAt,
          outcome.kind === "success" ? undefined : outcome.kind,
          sink,
        )
      : undefined;

    if (outcome.kind === "success") {
      sink?.testStep(step.stepNumber, total, step.title, "pass");
      sink?.agentMessage(outcome.output);
      return {
        stepNumber: step.stepNumber,
        success: true,
        durationMs,
        screenshotPath: screenshot,
        interventionUsed: false,
        agentOutput: outcome.output,
      };
    }

    if (outcome.kind === "timeout") {
      await this.waitForAbandonedCall(step, outcome.settled);
    }

    const errorText =
      outcome.kind === "timeout"
        ? outcome.error.message
        : `Step ${step.stepNumber} failed: ${failure ?? "unknown error"}`;
    sink?.testStep(step.stepNumber, total, step.title, "fail");
    sink?.error(errorText);

    if (outcome.kind === "error" && this.sessions.isFatalError(outcome.error)) {
      await this.sessions.recreate();
    }

    return {
      stepNumber: step.stepNumber,
      success: false,
      durationMs,
      errorMessage: errorText,
      screenshotPath: screenshot,
      interventionUsed: false,
    };
  }

  private async escalate(
    step: TestStep,
    ctx: RunContext,
    failed: StepResult,
  ): Promise<{ transition: Transition; details: string }> {
    const sink = this.opts.sink;
    const stepState = ctx.state.get(step.stepNumber);
    this._state = "ESCALATING";
    sink?.warn(
      `Step ${step.stepNumber} still failing after ${stepState.retryCount} retries - requesting human intervention`,
    );

    const context: InterventionContext = {
      stepNumber: step.stepNumber,
      stepTitle: step.title,
      errorMessage: failed.errorMessage ?? "Unknown error",
      screenshotPath: failed.screenshotPath,
      pageUrl: this.currentUrl(),
      retryCount: stepState.retryCount,
    };

    try {
      return await this.sessions.withProtection(async () => {
        const { response, fallback } = await this.gateway.request(context);

        const health = await this.sessions.verifyHealth();
        if (health.ok) {
          sink?.info(`Browser check after intervention: ${health.status}`);
        } else {
          sink?.warn(`Browser check after intervention: ${health.status}`);
        }

        const details = describeResponse(response);
        if (fallback) {
          stepState.unattendedFallbacks += 1;
          if (stepState.unattendedFallbacks >= this.opts.maxUnattendedFallbacks) {
            return {
              transition: {
                kind: "stop",
                message: `Test stopped: step ${step.stepNumber} got no operator response after ${stepState.unattendedFallbacks} intervention request(s)`,
              },
              details,
            };
          }
        } else {
          stepState.unattendedFallbacks = 0;
        }

        return { transition: this.applyResponse(response, step, ctx), details };
      });
    } finally {
      this._state = "RUNNING";
    }
  }

  private applyResponse(response: InterventionResponse, step: TestStep, ctx: RunContext): Transition {
    const sink = this.opts.sink;
    const steps = ctx.plan.steps;
    const index = step.stepNumber - 1;

    switch (response.action) {
      case "continue":
        if (response.additionalInstructions) {
          ctx.state.addGuidance(step.stepNumber, response.additionalInstructions);
          sink?.info(`Guidance added to step ${step.stepNumber}: ${response.additionalInstructions}`);
        }
        sink?.info(`Re-running step ${step.stepNumber}`);
        return { kind: "goto", index };

      case "skip":
        sink?.testStep(step.stepNumber, steps.length, step.title, "skip");
        return { kind: "goto", index: index + 1 };

      case "modify":
        if (response.message) {
          ctx.state.replaceActions(step.stepNumber, response.message);
          sink?.info(`Step ${step.stepNumber} actions replaced: ${response.message}`);
        } else {
          sink?.warn(`Modify without an instruction - re-running step ${step.stepNumber} unchanged`);
        }
        return { kind: "goto", index };

      case "goto": {
        const target = response.targetStep;
        if (target === undefined || !Number.isInteger(target) || target < 1 || target > steps.length) {
          return {
            kind: "stop",
            message: `Test stopped: cannot go to step ${target ?? "(none)"}, the plan has steps 1-${steps.length}`,
          };
        }
        sink?.info(`Jumping to step ${target}`);
        return { kind: "goto", index: target - 1 };
      }

      default:
        sink?.info(`Operator answered "${response.action}" - moving on from step ${step.stepNumber}`);
        return { kind: "goto", index: index + 1 };
    }
  }

  /**
   * Agents that ignore their abort signal keep driving the page after a
   * timeout. Hold the next attempt back until the call stops, up to the grace
   * period.
   */
  private async waitForAbandonedCall(step: TestStep, settled: Promise<void>): Promise<void> {
    const graceMs = this.opts.abandonedCallGraceMs ?? DEFAULT_ABANDONED_CALL_GRACE_MS;
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    try {
      const stopped = await Promise.race([settled.then(() => true), grace]);
      if (!stopped) {
        this.opts.sink?.warn(
          `Agent call for step ${step.stepNumber} still running ${Math.round(graceMs / 1000)}s after its timeout`,
        );
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private agentFor(session: SessionHandle): ExecutionAgent {
    if (!this.agent || this.agentSession !== session) {
      this.agent = this.createAgent(session);
      this.agentSession = session;
    }
    return this.agent;
  }

  private currentUrl(): string | undefined {
    try {
      return this.sessions.current?.currentUrl();
    } catch {
      return undefined;
    }
  }
}

function describeResponse(response: InterventionResponse): string {
  const parts = [`action: ${response.action}`];
  if (response.targetStep !== undefined) parts.push(`target: ${response.targetStep}`);
  if (response.message) parts.push(`message: ${response.message}`);
  if (response.additionalInstructions) parts.push(`guidance: ${response.additionalInstructions}`);
  return parts.join(", ");
}
