import fs from "fs/promises";
import { z } from "zod";
import { PlanValidationError } from "../errors.js";
import type { TestPlan } from "./types.js";

const StepSchema = z.object({
  stepNumber: z.number().int().positive(),
  title: z.string().min(1),
  description: z.string().default(""),
  actions: z.array(z.string().min(1)).min(1),
  expectedResult: z.string().optional(),
});

const PlanSchema = z.object({
  testName: z.string().min(1),
  environment: z.string().default("test"),
  objective: z.string().default(""),
  steps: z.array(StepSchema).min(1),
});

/**
 * Validates a pre-structured plan object. Step numbers must run 1..n in
 * plan order with no gaps or repeats.
 */
export function parsePlan(input: unknown): TestPlan {
  const parsed = PlanSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new PlanValidationError(`Invalid test plan: ${issues}`);
  }

  const plan = parsed.data;
  plan.steps.forEach((step, i) => {
    if (step.stepNumber !== i + 1) {
      throw new PlanValidationError(
        `Invalid test plan: step at position ${i + 1} is numbered ${step.stepNumber}`,
      );
    }
  });

  return plan;
}

export async function loadPlanFile(filePath: string): Promise<TestPlan> {
  const raw = await fs.readFile(filePath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new PlanValidationError(
      `Test plan ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parsePlan(data);
}
