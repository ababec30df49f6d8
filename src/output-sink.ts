export type StepStatus = "running" | "pass" | "fail" | "retry" | "skip";

/**
 * Abstraction over output delivery. The CLI sink writes to stdout with chalk
 * colors; the WebSocket sink emits typed messages to connected clients.
 */
export interface OutputSink {
  write(text: string): void;
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  agentMessage(msg: string): void;
  testStep(stepNumber: number, total: number, title: string, status: StepStatus): void;
  separator(): void;
  log(msg: string): void;
}
