import { describe, expect, it, vi } from "vitest";
import { isAbortError, raceAbort, throwIfAborted, withDeadline } from "./abort.js";

describe("withDeadline", () => {
  it("resolves with the operation's value before the deadline", async () => {
    await expect(withDeadline(async () => "done", { timeoutMs: 1000, onExpire: () => new Error("late") })).resolves.toBe(
      "done",
    );
  });

  it("rejects with the expiry error and aborts the operation's signal", async () => {
    let seen: AbortSignal | undefined;
    const expiry = new Error("too slow");

    await expect(
      withDeadline(
        (signal) => {
          seen = signal;
          return new Promise<string>(() => {});
        },
        { timeoutMs: 20, onExpire: () => expiry },
      ),
    ).rejects.toBe(expiry);

    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBe(expiry);
  });

  it("hands a rejection that arrives after expiry to onLateError", async () => {
    const onLateError = vi.fn();
    await expect(
      withDeadline(
        () => new Promise<string>((_, reject) => setTimeout(() => reject(new Error("agent gave up")), 40)),
        { timeoutMs: 10, onExpire: () => new Error("expired"), onLateError },
      ),
    ).rejects.toThrow("expired");

    await vi.waitFor(() => expect(onLateError).toHaveBeenCalledTimes(1));
    expect(onLateError.mock.calls[0][0]).toEqual(new Error("agent gave up"));
  });

  it("hands over a promise that settles when an abandoned operation stops", async () => {
    let finished = false;
    let settled: Promise<void> | undefined;
    await expect(
      withDeadline(
        () =>
          new Promise<string>((resolve) =>
            setTimeout(() => {
              finished = true;
              resolve("late");
            }, 40),
          ),
        {
          timeoutMs: 10,
          onExpire: () => new Error("expired"),
          onAbandoned: (promise) => {
            settled = promise;
          },
        },
      ),
    ).rejects.toThrow("expired");

    expect(finished).toBe(false);
    await settled;
    expect(finished).toBe(true);
  });

  it("passes through an operation's own failure", async () => {
    await expect(
      withDeadline(async () => {
        throw new Error("boom");
      }, { timeoutMs: 1000, onExpire: () => new Error("late") }),
    ).rejects.toThrow("boom");
  });
});

describe("abort helpers", () => {
  it("rejects with the signal's reason once aborted", async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<number>(() => {}), controller.signal);
    controller.abort(new Error("stop"));
    await expect(pending).rejects.toThrow("stop");
  });

  it("throws an AbortError when the reason is not an Error", () => {
    const controller = new AbortController();
    controller.abort("nope");
    let caught: unknown;
    try {
      throwIfAborted(controller.signal);
    } catch (err) {
      caught = err;
    }
    expect(isAbortError(caught)).toBe(true);
  });
});
