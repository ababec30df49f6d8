/**
 * Race a promise against an AbortSignal. If the signal fires before the
 * promise settles, the returned promise rejects with the signal's reason.
 * The original promise keeps running (cooperative cancellation).
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortReason(signal));
  return Promise.race([
    promise,
    new Promise<never>((_, reject) => {
      signal.addEventListener("abort", () => reject(abortReason(signal)), { once: true });
    }),
  ]);
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const err = new Error("Aborted");
  err.name = "AbortError";
  return err;
}

export interface DeadlineOptions {
  timeoutMs: number;
  /** Builds the error the deadline rejects with; it is also the abort reason. */
  onExpire: () => Error;
  /** Receives a rejection the operation produces after it was abandoned. */
  onLateError?: (err: unknown) => void;
  /**
   * Receives a promise that settles once an abandoned operation has finished.
   * Operations that ignore their signal keep running past the deadline.
   */
  onAbandoned?: (settled: Promise<void>) => void;
}

/**
 * Run a cancellable operation under a wall-clock deadline. The operation gets
 * its own AbortSignal, which is aborted when the deadline passes, so an agent
 * call or a prompt can stop work it no longer owns.
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let expired = false;

  const running = Promise.resolve().then(() => operation(controller.signal));
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      expired = true;
      const err = options.onExpire();
      controller.abort(err);
      reject(err);
    }, options.timeoutMs);
  });

  try {
    return await Promise.race([running, deadline]);
  } finally {
    clearTimeout(timer);
    if (expired) {
      const settled = running.then(
        () => undefined,
        (err: unknown) => options.onLateError?.(err),
      );
      options.onAbandoned?.(settled);
    }
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
