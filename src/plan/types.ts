export interface TestStep {
  readonly stepNumber: number;
  readonly title: string;
  readonly description: string;
  readonly actions: readonly string[];
  readonly expectedResult?: string;
}

/**
 * An already-parsed test plan. Steps are numbered 1..n in plan order; the
 * engine never mutates a plan, per-step run state lives in a StepStateTable.
 */
export interface TestPlan {
  readonly testName: string;
  readonly environment: string;
  readonly objective: string;
  readonly steps: readonly TestStep[];
}
