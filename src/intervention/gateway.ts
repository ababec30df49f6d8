import fs from "fs/promises";
import path from "path";
import { withDeadline } from "../abort.js";
import { InterventionTimeoutError, errorMessage } from "../errors.js";
import type { OutputSink } from "../output-sink.js";
import type {
  InterventionContext,
  InterventionRecord,
  InterventionResponse,
  InterventionTransport,
} from "./types.js";

export const DEFAULT_INTERVENTION_TIMEOUT_MS = 600_000;

export interface InterventionOutcome {
  response: InterventionResponse;
  /** Set when nobody answered and the gateway supplied its fallback. */
  fallback: boolean;
}

export interface InterventionGatewayOptions {
  timeoutMs?: number;
  sink?: OutputSink;
  now?: () => Date;
}

/**
 * Synchronous escalation to an operator. Every request resolves: a timeout
 * or a broken transport yields the `continue` fallback, and each exchange is
 * appended to a history that is never edited afterwards.
 */
export class InterventionGateway {
  readonly timeoutMs: number;
  private transport: InterventionTransport;
  private history: InterventionRecord[] = [];
  private sink?: OutputSink;
  private now: () => Date;

  constructor(transport: InterventionTransport, opts: InterventionGatewayOptions = {}) {
    this.transport = transport;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_INTERVENTION_TIMEOUT_MS;
    this.sink = opts.sink;
    this.now = opts.now ?? (() => new Date());
  }

  async request(context: InterventionContext): Promise<InterventionOutcome> {
    const snapshot = Object.freeze({ ...context });
    const timestamp = this.now().toISOString();
    this.sink?.warn(`Intervention requested - step ${snapshot.stepNumber}: ${snapshot.stepTitle}`);

    try {
      const response = await withDeadline(
        (signal) => this.transport.request(snapshot, signal),
        {
          timeoutMs: this.timeoutMs,
          onExpire: () => new InterventionTimeoutError(this.timeoutMs),
        },
      );
      this.record(snapshot, timestamp, { ...response }, false);
      return { response, fallback: false };
    } catch (err) {
      const timedOut = err instanceof InterventionTimeoutError;
      if (timedOut) {
        this.sink?.warn(`${err.message} - continuing with the default response`);
      } else {
        this.sink?.error(`Intervention transport "${this.transport.name}" failed: ${errorMessage(err)}`);
      }
      const response: InterventionResponse = {
        action: "continue",
        message: timedOut ? "Intervention timed out, continuing" : "Intervention failed, continuing",
      };
      this.record(
        snapshot,
        timestamp,
        { action: timedOut ? "timeout" : "error", message: errorMessage(err) },
        true,
      );
      return { response, fallback: true };
    }
  }

  getHistory(): readonly InterventionRecord[] {
    return [...this.history];
  }

  async saveHistory(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(this.history, null, 2), "utf-8");
  }

  private record(
    context: InterventionContext,
    timestamp: string,
    response: InterventionRecord["response"],
    fallback: boolean,
  ): void {
    this.history.push(
      Object.freeze({
        timestamp,
        stepNumber: context.stepNumber,
        stepTitle: context.stepTitle,
        errorMessage: context.errorMessage,
        retryCount: context.retryCount,
        transport: this.transport.name,
        response: Object.freeze(response),
        fallback,
      }),
    );
  }
}
