import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PlanValidationError } from "../errors.js";
import { loadPlanFile, parsePlan } from "./loader.js";

const minimal = {
  testName: "Login",
  steps: [
    { stepNumber: 1, title: "Open page", actions: ["Go to the login page"] },
    { stepNumber: 2, title: "Sign in", actions: ["Enter credentials", "Press submit"], expectedResult: "Dashboard" },
  ],
};

describe("parsePlan", () => {
  it("fills defaults for optional plan and step fields", () => {
    const plan = parsePlan(minimal);
    expect(plan.environment).toBe("test");
    expect(plan.objective).toBe("");
    expect(plan.steps[0].description).toBe("");
    expect(plan.steps[1].expectedResult).toBe("Dashboard");
  });

  it("reports schema problems with their path", () => {
    expect(() => parsePlan({ steps: minimal.steps })).toThrow("Invalid test plan: testName: Required");
  });

  it("rejects steps that are not numbered 1..n in order", () => {
    const plan = {
      ...minimal,
      steps: [minimal.steps[0], { ...minimal.steps[1], stepNumber: 3 }],
    };
    expect(() => parsePlan(plan)).toThrow(
      new PlanValidationError("Invalid test plan: step at position 2 is numbered 3"),
    );
  });

  it("rejects a step without actions", () => {
    const plan = { testName: "x", steps: [{ stepNumber: 1, title: "t", actions: [] }] };
    expect(() => parsePlan(plan)).toThrow(PlanValidationError);
  });
});

describe("loadPlanFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "plan-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads and validates a JSON plan", async () => {
    const file = path.join(dir, "plan.json");
    await fs.writeFile(file, JSON.stringify({ ...minimal, objective: "User can log in" }));
    const plan = await loadPlanFile(file);
    expect(plan.testName).toBe("Login");
    expect(plan.objective).toBe("User can log in");
    expect(plan.steps).toHaveLength(2);
  });

  it("fails on malformed JSON", async () => {
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{ not json");
    await expect(loadPlanFile(file)).rejects.toBeInstanceOf(PlanValidationError);
  });
});
