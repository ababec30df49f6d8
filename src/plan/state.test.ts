import { describe, expect, it } from "vitest";
import { StepStateTable } from "./state.js";
import type { TestStep } from "./types.js";

const step: TestStep = {
  stepNumber: 2,
  title: "Search",
  description: "",
  actions: ["Type a query", "Press enter"],
};

describe("StepStateTable", () => {
  it("starts every step with empty state", () => {
    const table = new StepStateTable();
    expect(table.get(5)).toEqual({ retryCount: 0, guidance: [], unattendedFallbacks: 0 });
  });

  it("only ever grows the retry counter", () => {
    const table = new StepStateTable();
    expect(table.incrementRetry(2)).toBe(1);
    expect(table.incrementRetry(2)).toBe(2);
    expect(table.get(2).retryCount).toBe(2);
    expect(table.get(1).retryCount).toBe(0);
  });

  it("keeps guidance in the order it was given", () => {
    const table = new StepStateTable();
    table.addGuidance(2, "first");
    table.addGuidance(2, "second");
    expect(table.get(2).guidance).toEqual(["first", "second"]);
  });

  it("uses replaced actions without touching the plan step", () => {
    const table = new StepStateTable();
    expect(table.effectiveActions(step)).toEqual(["Type a query", "Press enter"]);
    table.replaceActions(2, "Click the first suggestion");
    expect(table.effectiveActions(step)).toEqual(["Click the first suggestion"]);
    expect(step.actions).toEqual(["Type a query", "Press enter"]);
  });
});
