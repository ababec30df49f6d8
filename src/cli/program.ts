import { Command, InvalidArgumentError } from "commander";
import type { ConfigOverrides } from "../config/index.js";
import { MAX_TIMEOUT_SECONDS } from "../config/types.js";

export interface RunCommandOptions {
  maxRetries?: number;
  stepTimeout?: number;
  interventionTimeout?: number;
  vision?: boolean;
  headless?: boolean;
  screenshotsDir?: string;
}

export type RunHandler = (planPath: string, overrides: ConfigOverrides) => Promise<void>;

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError("Expected a whole number.");
  }
  return n;
}

function positiveSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive number of seconds.");
  }
  if (n > MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(`Expected at most ${MAX_TIMEOUT_SECONDS} seconds.`);
  }
  return n;
}

export function toOverrides(opts: RunCommandOptions): ConfigOverrides {
  return {
    maxRetries: opts.maxRetries,
    stepTimeoutMs: opts.stepTimeout === undefined ? undefined : opts.stepTimeout * 1000,
    interventionTimeoutMs:
      opts.interventionTimeout === undefined ? undefined : opts.interventionTimeout * 1000,
    useVision: opts.vision,
    headless: opts.headless,
    screenshotsDir: opts.screenshotsDir,
  };
}

export function buildProgram(onRun: RunHandler): Command {
  const program = new Command("stepwise-qa")
    .description("Run a structured browser test plan with retries and human intervention");

  program
    .command("run")
    .description("Execute a JSON test plan")
    .argument("<plan>", "path to the test plan (.json)")
    .option("--max-retries <n>", "automatic retries per step before escalating", nonNegativeInt)
    .option("--step-timeout <seconds>", "time limit for one agent attempt", positiveSeconds)
    .option("--intervention-timeout <seconds>", "how long to wait for an operator", positiveSeconds)
    .option("--vision", "let the agent see screenshots (computer-use model)")
    .option("--no-vision", "drive the page from the DOM only")
    .option("--headless", "run the browser without a window")
    .option("--no-headless", "show the browser window")
    .option("--screenshots-dir <dir>", "where step screenshots are written")
    .action(async (plan: string, opts: RunCommandOptions) => {
      await onRun(plan, toOverrides(opts));
    });

  return program;
}
