import { describe, expect, it, vi } from "vitest";
import { SessionCreationError } from "../errors.js";
import { FakeSession, FakeSessionFactory, noSleep, recordingSink } from "../test-support.js";
import { SessionManager } from "./manager.js";
import type { SessionFactory, SystemProbe } from "./types.js";

describe("SessionManager.acquire", () => {
  it("creates the session once and reuses it", async () => {
    const factory = new FakeSessionFactory();
    const manager = new SessionManager(factory, { sleep: noSleep });
    const first = await manager.acquire();
    const second = await manager.acquire();
    expect(second).toBe(first);
    expect(factory.created).toHaveLength(1);
  });

  it("retries creation with a delay between attempts", async () => {
    const factory = new FakeSessionFactory(2);
    const sleep = vi.fn(noSleep);
    const sink = recordingSink();
    const manager = new SessionManager(factory, { sleep, retryDelayMs: 5000, sink });

    const session = await manager.acquire();
    expect(session.id).toBe("session-1");
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(5000);
    expect(sink.lines).toContain("info: Creating browser session (attempt 3/3)...");
  });

  it("gives up after the last attempt", async () => {
    const factory = new FakeSessionFactory(3);
    const sleep = vi.fn(noSleep);
    const manager = new SessionManager(factory, { sleep });

    const err = await manager.acquire().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SessionCreationError);
    expect(err).toHaveProperty(
      "message",
      "Could not create a browser session after 3 attempt(s): Chrome exited with code 1",
    );
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(manager.current).toBeNull();
  });

  it("bounds each attempt by the start-up timeout and closes a late session", async () => {
    const late = new FakeSession("late");
    const factory: SessionFactory = {
      create: () => new Promise((resolve) => setTimeout(() => resolve(late), 40)),
    };
    const manager = new SessionManager(factory, { maxAttempts: 1, startupTimeoutMs: 10, sleep: noSleep });

    await expect(manager.acquire()).rejects.toThrow("Browser session start-up timed out");
    await vi.waitFor(() => expect(late.closeCalls).toBe(1));
  });

  it("cleans up stray browsers when memory is under pressure", async () => {
    const probe: SystemProbe = {
      memoryUsagePercent: () => 95,
      killStrayBrowsers: vi.fn(async () => {}),
    };
    const manager = new SessionManager(new FakeSessionFactory(), { probe, sleep: noSleep });
    await manager.acquire();
    expect(probe.killStrayBrowsers).toHaveBeenCalledTimes(1);
  });

  it("leaves processes alone below the memory threshold", async () => {
    const probe: SystemProbe = {
      memoryUsagePercent: () => 40,
      killStrayBrowsers: vi.fn(async () => {}),
    };
    const manager = new SessionManager(new FakeSessionFactory(), { probe, sleep: noSleep });
    await manager.acquire();
    expect(probe.killStrayBrowsers).not.toHaveBeenCalled();
  });

  it("waits and then cleans up after each failed attempt but the last", async () => {
    const order: string[] = [];
    const probe: SystemProbe = {
      memoryUsagePercent: () => 40,
      killStrayBrowsers: async () => {
        order.push("cleanup");
      },
    };
    const sleep = async (ms: number) => {
      order.push(`sleep ${ms}`);
    };
    const manager = new SessionManager(new FakeSessionFactory(3), { probe, sleep, retryDelayMs: 5000 });

    await expect(manager.acquire()).rejects.toBeInstanceOf(SessionCreationError);
    expect(order).toEqual(["sleep 5000", "cleanup", "sleep 5000", "cleanup"]);
  });
});

describe("SessionManager.verifyHealth", () => {
  it("reports a loaded page", async () => {
    const manager = new SessionManager(new FakeSessionFactory(), { sleep: noSleep });
    await manager.acquire();
    expect(await manager.verifyHealth()).toEqual({
      ok: true,
      status: "Page loaded - title: Shop, content length: 200",
    });
  });

  it("accepts a titled page with little text", async () => {
    const manager = new SessionManager(new FakeSessionFactory(), { sleep: noSleep });
    const session = await manager.acquire();
    if (session instanceof FakeSession) {
      session.page = { url: "https://shop.test/", title: "Loading", bodyTextLength: 3 };
    }
    expect(await manager.verifyHealth()).toEqual({ ok: true, status: "Page may still be loading - title: Loading" });
  });

  it("flags a blank page and a failing check without throwing", async () => {
    const manager = new SessionManager(new FakeSessionFactory(), { sleep: noSleep });
    const session = await manager.acquire();
    if (!(session instanceof FakeSession)) throw new Error("expected a fake session");

    session.page = { url: "about:blank", title: "", bodyTextLength: 0 };
    expect(await manager.verifyHealth()).toEqual({
      ok: false,
      status: "Page looks blank - URL: about:blank, content length: 0",
    });

    vi.spyOn(session, "inspectPage").mockRejectedValue(new Error("Target closed"));
    expect(await manager.verifyHealth()).toEqual({ ok: false, status: "Page check failed: Target closed" });
  });

  it("reports a missing session", async () => {
    const manager = new SessionManager(new FakeSessionFactory(), { sleep: noSleep });
    expect(await manager.verifyHealth()).toEqual({ ok: false, status: "No browser session" });
  });
});

describe("SessionManager.release", () => {
  it("closes once and is idempotent", async () => {
    const manager = new SessionManager(new FakeSessionFactory(), { sleep: noSleep });
    const session = await manager.acquire();
    expect(await manager.release()).toBe("closed");
    expect(await manager.release()).toBe("absent");
    expect(session instanceof FakeSession && session.closeCalls).toBe(1);
    expect(manager.current).toBeNull();
  });

  it("refuses to close while protected", async () => {
    const sink = recordingSink();
    const manager = new SessionManager(new FakeSessionFactory(), { sleep: noSleep, sink });
    const session = await manager.acquire();

    const outcome = await manager.withProtection(async () => manager.release());
    expect(outcome).toBe("protected");
    expect(manager.current).toBe(session);
    expect(manager.isProtected).toBe(false);
    expect(sink.lines).toContain(
      "warn: Close requested while an intervention is in progress - keeping the browser open",
    );
  });

  it("restores protection even when the guarded work throws", async () => {
    const manager = new SessionManager(new FakeSessionFactory(), { sleep: noSleep });
    await expect(
      manager.withProtection(async () => {
        throw new Error("transport down");
      }),
    ).rejects.toThrow("transport down");
    expect(manager.isProtected).toBe(false);
  });

  it("logs a failing close and still drops the handle", async () => {
    const sink = recordingSink();
    const manager = new SessionManager(new FakeSessionFactory(), { sleep: noSleep, sink });
    const session = await manager.acquire();
    if (session instanceof FakeSession) session.closeError = new Error("already gone");

    expect(await manager.release()).toBe("closed");
    expect(manager.current).toBeNull();
    expect(sink.lines).toContain("warn: Failed to close browser session: already gone");
  });

  it("notifies release listeners until they unsubscribe", async () => {
    const manager = new SessionManager(new FakeSessionFactory(), { sleep: noSleep });
    const listener = vi.fn();
    const unsubscribe = manager.onRelease(listener);

    const first = await manager.acquire();
    await manager.release();
    expect(listener).toHaveBeenCalledWith(first);

    unsubscribe();
    await manager.acquire();
    await manager.release();
    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe("SessionManager fatal errors", () => {
  const manager = new SessionManager(new FakeSessionFactory(), { sleep: noSleep });

  it.each([
    "Browser crashed unexpectedly",
    "connect ECONNREFUSED: Connection refused",
    "Protocol error: Target closed.",
    "Browser process exited with code 9",
    "Browser has been closed",
  ])("treats %s as fatal", (message) => {
    expect(manager.isFatalError(new Error(message))).toBe(true);
  });

  it("does not treat ordinary failures as fatal", () => {
    expect(manager.isFatalError(new Error("Element not found"))).toBe(false);
  });

  it("recreate closes the session and waits before the next acquire", async () => {
    const factory = new FakeSessionFactory();
    const sleep = vi.fn(noSleep);
    const recreating = new SessionManager(factory, { sleep, recreateSettleMs: 2000 });
    const first = await recreating.acquire();

    expect(await recreating.recreate()).toBe("closed");
    expect(sleep).toHaveBeenCalledWith(2000);
    const second = await recreating.acquire();
    expect(second).not.toBe(first);
    expect(factory.created).toHaveLength(2);
  });
});
