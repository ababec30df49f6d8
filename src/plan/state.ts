import type { TestStep } from "./types.js";

export interface StepState {
  /** Automatic retries spent on this step number. Only ever grows. */
  retryCount: number;
  /** Operator hints, in the order they were given. */
  guidance: string[];
  /** Replacement action list set by a `modify` intervention. */
  actionsOverride?: string[];
  /** Consecutive intervention timeouts answered with the fallback. */
  unattendedFallbacks: number;
}

/**
 * Mutable run state for each step, kept beside the plan instead of on it.
 * Keyed by step number, so a step revisited through `goto` keeps its counters.
 */
export class StepStateTable {
  private states = new Map<number, StepState>();

  get(stepNumber: number): StepState {
    let state = this.states.get(stepNumber);
    if (!state) {
      state = { retryCount: 0, guidance: [], unattendedFallbacks: 0 };
      this.states.set(stepNumber, state);
    }
    return state;
  }

  incrementRetry(stepNumber: number): number {
    const state = this.get(stepNumber);
    state.retryCount += 1;
    return state.retryCount;
  }

  addGuidance(stepNumber: number, text: string): void {
    this.get(stepNumber).guidance.push(text);
  }

  replaceActions(stepNumber: number, action: string): void {
    this.get(stepNumber).actionsOverride = [action];
  }

  /** The actions to execute: the operator's replacement if any, else the plan's. */
  effectiveActions(step: TestStep): readonly string[] {
    return this.states.get(step.stepNumber)?.actionsOverride ?? step.actions;
  }
}
