import path from "path";
import { createStagehandAgentFactory } from "./agent/stagehand-agent.js";
import { browserProfileDir, createStagehandSessionFactory } from "./browser/stagehand.js";
import type { AppConfig } from "./config/index.js";
import { ExecutionEngine } from "./engine/executor.js";
import { errorMessage } from "./errors.js";
import { InterventionGateway } from "./intervention/gateway.js";
import type { InterventionTransport } from "./intervention/types.js";
import type { OutputSink } from "./output-sink.js";
import type { TestPlan } from "./plan/types.js";
import type { RunResult } from "./report/types.js";
import { SessionManager } from "./session/manager.js";
import { createSystemProbe } from "./session/system.js";

export interface RunCore {
  run: (plan: TestPlan) => Promise<RunResult>;
}

/** Wires one run's collaborators around a Stagehand browser session. */
export function createRunCore(
  config: AppConfig,
  sink: OutputSink,
  transport: InterventionTransport,
): RunCore {
  sink.info(`Provider: ${config.provider} | Model: ${config.useVision ? config.cuaModel : config.agentModel}`);
  sink.info(`Headless: ${config.headless} | Vision: ${config.useVision}`);
  sink.info(
    `Retries: ${config.maxRetries} | Step timeout: ${config.stepTimeoutMs / 1000}s | Intervention timeout: ${config.interventionTimeoutMs / 1000}s`,
  );

  const sessions = new SessionManager(createStagehandSessionFactory(config, sink), {
    probe: createSystemProbe(browserProfileDir(config)),
    sink,
  });
  const gateway = new InterventionGateway(transport, {
    timeoutMs: config.interventionTimeoutMs,
    sink,
  });
  const engine = new ExecutionEngine(
    { sessions, gateway, createAgent: createStagehandAgentFactory(config) },
    {
      maxRetries: config.maxRetries,
      stepTimeoutMs: config.stepTimeoutMs,
      useVision: config.useVision,
      maxUnattendedFallbacks: config.maxUnattendedFallbacks,
      screenshotsDir: config.screenshotsDir,
      sink,
    },
  );

  async function run(plan: TestPlan): Promise<RunResult> {
    const result = await engine.run(plan);
    if (result.interventions.length > 0) {
      const file = path.join(
        config.dataDir,
        "interventions",
        `${slugify(plan.testName)}_${Date.now()}.json`,
      );
      try {
        await gateway.saveHistory(file);
        sink.info(`Intervention history saved to ${file}`);
      } catch (err) {
        sink.warn(`Could not save intervention history: ${errorMessage(err)}`);
      }
    }
    return result;
  }

  return { run };
}

export function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 50);
  return slug || "test";
}
