import type { Stagehand } from "@browserbasehq/stagehand";
import { raceAbort, throwIfAborted } from "../abort.js";
import { StagehandSession } from "../browser/stagehand.js";
import type { AppConfig } from "../config/types.js";
import { StepExecutionError } from "../errors.js";
import type { SessionHandle } from "../session/types.js";
import type { AgentFactory, ExecutionAgent, InvokeOptions } from "./types.js";

const SYSTEM_PROMPT = [
  "You are executing a single step of a scripted QA test in a web browser.",
  "Your ONLY job is to perform the actions described in the instruction.",
  "Do NOT explore, test, or navigate to pages unrelated to this step.",
  "Do NOT invent or substitute a different goal.",
  "Once the actions are complete, stop immediately and report what happened.",
].join("\n");

/**
 * Runs step tasks through a Stagehand agent. With vision on it uses the
 * computer-use model on screenshots; otherwise it works from the DOM.
 */
export class StagehandAgent implements ExecutionAgent {
  private stagehand: Stagehand;
  private config: AppConfig;

  constructor(stagehand: Stagehand, config: AppConfig) {
    this.stagehand = stagehand;
    this.config = config;
  }

  async invoke(task: string, { useVision, signal }: InvokeOptions): Promise<string> {
    throwIfAborted(signal);

    const agent = this.stagehand.agent({
      mode: useVision ? "cua" : "dom",
      model: {
        modelName: useVision ? this.config.cuaModel : this.config.agentModel,
        apiKey: this.config.apiKey,
      },
      systemPrompt: SYSTEM_PROMPT,
    });

    // The DOM agent stops on its signal; the CUA agent takes none and is
    // waited out by the engine after a timeout.
    const result = await raceAbort(
      agent.execute({
        instruction: task,
        maxSteps: 20,
        highlightCursor: useVision,
        ...(useVision ? {} : { signal }),
      }),
      signal,
    );

    if (result.success !== true) {
      throw new StepExecutionError(result.message || "Agent did not complete the step");
    }
    return result.message || "Step completed.";
  }
}

export function createStagehandAgentFactory(config: AppConfig): AgentFactory {
  return (session: SessionHandle) => {
    if (!(session instanceof StagehandSession)) {
      throw new Error(`Session ${session.id} is not a Stagehand session`);
    }
    return new StagehandAgent(session.stagehand, config);
  };
}
