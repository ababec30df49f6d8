import type { OutputSink, StepStatus } from "./output-sink.js";
import * as display from "./cli/display.js";

export function createCliSink(): OutputSink {
  return {
    write(text: string) {
      process.stdout.write(text);
    },
    info(msg: string) {
      display.info(msg);
    },
    success(msg: string) {
      display.success(msg);
    },
    warn(msg: string) {
      display.warn(msg);
    },
    error(msg: string) {
      display.error(msg);
    },
    agentMessage(msg: string) {
      display.agentMessage(msg);
    },
    testStep(stepNumber: number, total: number, title: string, status: StepStatus) {
      display.testStep(stepNumber, total, title, status);
    },
    separator() {
      display.separator();
    },
    log(msg: string) {
      console.log(msg);
    },
  };
}
