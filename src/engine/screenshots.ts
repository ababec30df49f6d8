import path from "path";
import { errorMessage } from "../errors.js";
import type { OutputSink } from "../output-sink.js";
import type { SessionHandle } from "../session/types.js";

export type ScreenshotTag = "timeout" | "error";

/** `<dir>/step_<NN>_<unixSeconds>[_<tag>].png` */
export function screenshotPath(
  dir: string,
  stepNumber: number,
  at: Date,
  tag?: ScreenshotTag,
): string {
  const seconds = Math.floor(at.getTime() / 1000);
  const suffix = tag ? `_${tag}` : "";
  return path.join(dir, `step_${String(stepNumber).padStart(2, "0")}_${seconds}${suffix}.png`);
}

/** Best effort: a failed capture is logged and yields undefined. */
export async function captureStepScreenshot(
  session: SessionHandle,
  dir: string,
  stepNumber: number,
  at: Date,
  tag?: ScreenshotTag,
  sink?: OutputSink,
): Promise<string | undefined> {
  const filePath = screenshotPath(dir, stepNumber, at, tag);
  try {
    await session.captureScreenshot(filePath);
    return filePath;
  } catch (err) {
    sink?.warn(`Screenshot for step ${stepNumber} failed: ${errorMessage(err)}`);
    return undefined;
  }
}
