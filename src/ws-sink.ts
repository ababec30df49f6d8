import type { Broadcaster } from "./intervention/ws-transport.js";
import type { OutputSink, StepStatus } from "./output-sink.js";
import type { LogPayload, StepUpdatePayload, StreamChunkPayload } from "./protocol.js";

export function createWsSink(broadcaster: Broadcaster, runId?: string): OutputSink {
  const log = (level: LogPayload["level"], message: string) => {
    broadcaster.broadcast({ type: "log", id: runId, payload: { level, message } satisfies LogPayload });
  };

  return {
    write(text: string) {
      broadcaster.broadcast({ type: "stream_chunk", id: runId, payload: { text } satisfies StreamChunkPayload });
    },
    info(msg: string) {
      log("info", msg);
    },
    success(msg: string) {
      log("success", msg);
    },
    warn(msg: string) {
      log("warn", msg);
    },
    error(msg: string) {
      log("error", msg);
    },
    agentMessage(msg: string) {
      log("agent", msg);
    },
    testStep(stepNumber: number, total: number, title: string, status: StepStatus) {
      broadcaster.broadcast({
        type: "step_update",
        id: runId,
        payload: { stepNumber, total, title, status } satisfies StepUpdatePayload,
      });
    },
    separator() {},
    log(msg: string) {
      log("info", msg);
    },
  };
}
