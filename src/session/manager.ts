import { delay, withDeadline } from "../abort.js";
import { SessionCreationError, errorMessage } from "../errors.js";
import type { OutputSink } from "../output-sink.js";
import type {
  HealthReport,
  ReleaseOutcome,
  SessionFactory,
  SessionHandle,
  SystemProbe,
} from "./types.js";

const FATAL_SESSION_ERRORS = [
  "browser crashed",
  "connection refused",
  "target closed",
  "browser process exited",
  "browser has been closed",
];

export interface SessionManagerOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
  startupTimeoutMs?: number;
  /** Pause after closing a crashed session, before a new one is created. */
  recreateSettleMs?: number;
  memoryThresholdPercent?: number;
  probe?: SystemProbe;
  sink?: OutputSink;
  sleep?: (ms: number) => Promise<void>;
}

type ReleaseListener = (handle: SessionHandle) => void;

/**
 * Owns the one browser session of a run. The session is created lazily,
 * survives step timeouts and interventions, and is only closed through
 * `release()`, which refuses while the session is protected.
 */
export class SessionManager {
  private handle: SessionHandle | null = null;
  private protectedFlag = false;
  private releaseListeners = new Set<ReleaseListener>();
  private factory: SessionFactory;
  private maxAttempts: number;
  private retryDelayMs: number;
  private startupTimeoutMs: number;
  private recreateSettleMs: number;
  private memoryThresholdPercent: number;
  private probe?: SystemProbe;
  private sink?: OutputSink;
  private sleep: (ms: number) => Promise<void>;

  constructor(factory: SessionFactory, opts: SessionManagerOptions = {}) {
    this.factory = factory;
    this.maxAttempts = opts.maxAttempts ?? 3;
    this.retryDelayMs = opts.retryDelayMs ?? 5000;
    this.startupTimeoutMs = opts.startupTimeoutMs ?? 60_000;
    this.recreateSettleMs = opts.recreateSettleMs ?? 2000;
    this.memoryThresholdPercent = opts.memoryThresholdPercent ?? 90;
    this.probe = opts.probe;
    this.sink = opts.sink;
    this.sleep = opts.sleep ?? delay;
  }

  get current(): SessionHandle | null {
    return this.handle;
  }

  get isProtected(): boolean {
    return this.protectedFlag;
  }

  async acquire(): Promise<SessionHandle> {
    if (this.handle) return this.handle;

    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      this.sink?.info(`Creating browser session (attempt ${attempt}/${this.maxAttempts})...`);
      await this.relieveMemoryPressure();

      try {
        const handle = await withDeadline(
          (signal) => this.startSession(signal),
          {
            timeoutMs: this.startupTimeoutMs,
            onExpire: () =>
              new Error(`Browser session start-up timed out after ${Math.round(this.startupTimeoutMs / 1000)}s`),
          },
        );
        this.handle = handle;
        this.sink?.success("Browser session ready");
        return handle;
      } catch (err) {
        lastError = err;
        this.sink?.error(`Browser session attempt ${attempt} failed: ${errorMessage(err)}`);
        if (attempt < this.maxAttempts) {
          await this.sleep(this.retryDelayMs);
          await this.cleanUpStrayBrowsers();
        }
      }
    }

    throw new SessionCreationError(this.maxAttempts, lastError);
  }

  /** Best-effort page check; never throws. */
  async verifyHealth(): Promise<HealthReport> {
    if (!this.handle) {
      return { ok: false, status: "No browser session" };
    }
    try {
      const page = await this.handle.inspectPage();
      if (page.bodyTextLength > 50) {
        return { ok: true, status: `Page loaded - title: ${page.title}, content length: ${page.bodyTextLength}` };
      }
      if (page.title.trim()) {
        return { ok: true, status: `Page may still be loading - title: ${page.title}` };
      }
      return { ok: false, status: `Page looks blank - URL: ${page.url}, content length: ${page.bodyTextLength}` };
    } catch (err) {
      return { ok: false, status: `Page check failed: ${errorMessage(err)}` };
    }
  }

  setProtected(flag: boolean): void {
    if (this.protectedFlag === flag) return;
    this.protectedFlag = flag;
    if (flag) {
      this.sink?.info("Browser protection on - session will stay open");
    } else {
      this.sink?.info("Browser protection off");
    }
  }

  /** Holds protection for the whole of `fn`, including when it throws. */
  async withProtection<T>(fn: () => Promise<T>): Promise<T> {
    const wasProtected = this.protectedFlag;
    this.setProtected(true);
    try {
      return await fn();
    } finally {
      this.setProtected(wasProtected);
    }
  }

  /**
   * Close the session unless it is protected. Calling it again, or with no
   * session, is a no-op.
   */
  async release(): Promise<ReleaseOutcome> {
    if (this.protectedFlag) {
      this.sink?.warn("Close requested while an intervention is in progress - keeping the browser open");
      return "protected";
    }
    const handle = this.handle;
    if (!handle) return "absent";

    this.handle = null;
    for (const listener of this.releaseListeners) listener(handle);

    try {
      await handle.close();
      this.sink?.info("Browser session closed");
    } catch (err) {
      this.sink?.warn(`Failed to close browser session: ${errorMessage(err)}`);
    }
    return "closed";
  }

  onRelease(listener: ReleaseListener): () => void {
    this.releaseListeners.add(listener);
    return () => {
      this.releaseListeners.delete(listener);
    };
  }

  /** Crash-class failures that mean the session itself is gone. */
  isFatalError(err: unknown): boolean {
    const text = errorMessage(err).toLowerCase();
    return FATAL_SESSION_ERRORS.some((keyword) => text.includes(keyword));
  }

  /**
   * Drop a crashed session so the next `acquire()` starts a fresh one.
   */
  async recreate(): Promise<ReleaseOutcome> {
    this.sink?.warn("Fatal browser error detected - recreating the browser session");
    const outcome = await this.release();
    if (outcome === "closed") {
      await this.sleep(this.recreateSettleMs);
    }
    return outcome;
  }

  private async startSession(signal: AbortSignal): Promise<SessionHandle> {
    const handle = await this.factory.create(signal);
    if (signal.aborted) {
      // Started after the deadline; nobody owns it.
      await handle.close().catch((err: unknown) => {
        this.sink?.warn(`Failed to close late browser session: ${errorMessage(err)}`);
      });
      throw signal.reason instanceof Error ? signal.reason : new Error("Browser session start-up aborted");
    }
    return handle;
  }

  private async relieveMemoryPressure(): Promise<void> {
    if (!this.probe) return;
    let usage: number;
    try {
      usage = this.probe.memoryUsagePercent();
    } catch (err) {
      this.sink?.warn(`Could not read system memory: ${errorMessage(err)}`);
      return;
    }
    if (usage <= this.memoryThresholdPercent) return;

    this.sink?.warn(`Memory usage at ${usage.toFixed(0)}% - cleaning up stray browser processes`);
    await this.cleanUpStrayBrowsers();
  }

  private async cleanUpStrayBrowsers(): Promise<void> {
    if (!this.probe) return;
    try {
      await this.probe.killStrayBrowsers();
    } catch (err) {
      this.sink?.warn(`Browser process cleanup failed: ${errorMessage(err)}`);
    }
  }
}
