import type { StepStateTable } from "../plan/state.js";
import type { TestPlan, TestStep } from "../plan/types.js";

/**
 * Build the instruction handed to the agent for one step: the test
 * objective, the actions to perform (or the operator's replacement), the
 * expected outcome and every hint given for this step so far.
 */
export function buildStepTask(
  step: TestStep,
  plan: TestPlan,
  state: StepStateTable,
): string {
  const lines = [`## Step ${step.stepNumber}: ${step.title}`, ""];

  if (plan.objective) {
    lines.push("### Test objective", plan.objective, "");
  }
  if (step.description) {
    lines.push("### Context", step.description, "");
  }

  lines.push("### Actions");
  for (const action of state.effectiveActions(step)) {
    lines.push(`- ${action}`);
  }

  if (step.expectedResult) {
    lines.push("", "### Expected result", step.expectedResult);
  }

  const { guidance } = state.get(step.stepNumber);
  if (guidance.length > 0) {
    lines.push("", "### Operator guidance");
    for (const hint of guidance) {
      lines.push(`- ${hint}`);
    }
  }

  lines.push(
    "",
    "Perform only the actions above. Do not navigate away or start other tasks.",
    "When done, stop and describe what you see on the page.",
  );

  return lines.join("\n");
}
