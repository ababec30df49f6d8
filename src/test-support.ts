import type { OutputSink, StepStatus } from "./output-sink.js";
import type { PageInspection, SessionFactory, SessionHandle } from "./session/types.js";

export interface RecordingSink extends OutputSink {
  lines: string[];
  steps: { stepNumber: number; status: StepStatus }[];
}

export function recordingSink(): RecordingSink {
  const lines: string[] = [];
  const steps: { stepNumber: number; status: StepStatus }[] = [];
  const push = (prefix: string) => (msg: string) => {
    lines.push(`${prefix}${msg}`);
  };
  return {
    lines,
    steps,
    write: push(""),
    info: push("info: "),
    success: push("success: "),
    warn: push("warn: "),
    error: push("error: "),
    agentMessage: push("agent: "),
    testStep(stepNumber, _total, _title, status) {
      steps.push({ stepNumber, status });
    },
    separator() {},
    log: push(""),
  };
}

export class FakeSession implements SessionHandle {
  readonly id: string;
  closeCalls = 0;
  screenshots: string[] = [];
  page: PageInspection = { url: "https://shop.test/", title: "Shop", bodyTextLength: 200 };
  screenshotError?: Error;
  closeError?: Error;

  constructor(id: string) {
    this.id = id;
  }

  currentUrl(): string {
    return this.page.url;
  }

  async inspectPage(): Promise<PageInspection> {
    return this.page;
  }

  async captureScreenshot(filePath: string): Promise<void> {
    if (this.screenshotError) throw this.screenshotError;
    this.screenshots.push(filePath);
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    if (this.closeError) throw this.closeError;
  }
}

/** Hands out FakeSessions; `failures` makes the first n creations throw. */
export class FakeSessionFactory implements SessionFactory {
  created: FakeSession[] = [];
  failures: number;

  constructor(failures = 0) {
    this.failures = failures;
  }

  async create(): Promise<FakeSession> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error("Chrome exited with code 1");
    }
    const session = new FakeSession(`session-${this.created.length + 1}`);
    this.created.push(session);
    return session;
  }
}

export const noSleep = async (): Promise<void> => {};
