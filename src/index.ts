#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import * as display from "./cli/display.js";
import { createCliSink } from "./cli-sink.js";
import { loadConfig } from "./config/index.js";
import { createRunCore } from "./core.js";
import { ConsoleTransport } from "./intervention/console-transport.js";
import { loadPlanFile } from "./plan/loader.js";
import { buildSummaryMessage, printRunSummary } from "./report/aggregator.js";

async function main() {
  const program = buildProgram(async (planPath, overrides) => {
    display.banner();
    const sink = createCliSink();

    const config = loadConfig(process.env, overrides);
    const plan = await loadPlanFile(planPath);
    display.info(`Loaded plan "${plan.testName}" with ${plan.steps.length} steps`);

    const core = createRunCore(config, sink, new ConsoleTransport());
    display.separator();
    const result = await core.run(plan);

    printRunSummary(result, sink);
    const passed = result.stepResults.filter((r) => r.success).length;
    display.runVerdict(passed, result.stepResults.length - passed, result.success);
    sink.log(buildSummaryMessage(result));

    process.exit(result.success ? 0 : 1);
  });

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  display.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
