import path from "path";
import { describe, expect, it } from "vitest";
import { FakeSession, recordingSink } from "../test-support.js";
import { captureStepScreenshot, screenshotPath } from "./screenshots.js";

const at = new Date("2026-03-01T10:00:00.750Z");
const seconds = Math.floor(at.getTime() / 1000);

describe("screenshotPath", () => {
  it("pads the step number and tags failures", () => {
    expect(screenshotPath("shots", 3, at)).toBe(path.join("shots", `step_03_${seconds}.png`));
    expect(screenshotPath("shots", 12, at, "timeout")).toBe(path.join("shots", `step_12_${seconds}_timeout.png`));
    expect(screenshotPath("shots", 1, at, "error")).toBe(path.join("shots", `step_01_${seconds}_error.png`));
  });
});

describe("captureStepScreenshot", () => {
  it("returns the path it captured to", async () => {
    const session = new FakeSession("s");
    const file = await captureStepScreenshot(session, "shots", 2, at, "error");
    expect(file).toBe(path.join("shots", `step_02_${seconds}_error.png`));
    expect(session.screenshots).toEqual([file]);
  });

  it("logs and returns undefined when the capture fails", async () => {
    const session = new FakeSession("s");
    session.screenshotError = new Error("page crashed");
    const sink = recordingSink();
    expect(await captureStepScreenshot(session, "shots", 2, at, undefined, sink)).toBeUndefined();
    expect(sink.lines).toEqual(["warn: Screenshot for step 2 failed: page crashed"]);
  });
});
