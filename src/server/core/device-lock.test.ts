import { describe, expect, it } from "vitest";
import { DeviceLock } from "./device-lock";
import { CancelledError } from "./errors";

describe("DeviceLock", () => {
  it("grants a free lock immediately", async () => {
    const lock = new DeviceLock();
    const release = await lock.acquire();
    expect(lock.locked).toBe(true);
    release();
    expect(lock.locked).toBe(false);
  });

  it("hands the lock to waiters in arrival order", async () => {
    const lock = new DeviceLock();
    const order: string[] = [];
    const release = await lock.acquire();

    const a = lock.run(() => { order.push("a"); });
    const b = lock.run(() => { order.push("b"); });
    expect(lock.pending).toBe(2);

    release();
    await Promise.all([a, b]);
    expect(order).toEqual(["a", "b"]);
    expect(lock.locked).toBe(false);
  });

  it("rejects at once when the signal is already aborted", async () => {
    const lock = new DeviceLock();
    const ctrl = new AbortController();
    ctrl.abort();

    await expect(lock.acquire(ctrl.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(lock.locked).toBe(false);
  });

  it("drops an aborted waiter from the queue", async () => {
    const lock = new DeviceLock();
    const release = await lock.acquire();
    const ctrl = new AbortController();

    const cancelled = lock.acquire(ctrl.signal);
    const next = lock.acquire();
    ctrl.abort();

    await expect(cancelled).rejects.toMatchObject({ code: "ERESTARTSYS" });
    expect(lock.pending).toBe(1);

    release();
    const releaseNext = await next;
    expect(lock.locked).toBe(true);
    releaseNext();
    expect(lock.locked).toBe(false);
  });

  it("releases after the guarded body throws", async () => {
    const lock = new DeviceLock();
    await expect(lock.run(() => { throw new Error("boom"); })).rejects.toThrow("boom");
    expect(lock.locked).toBe(false);
  });

  it("ignores a second call of the same release", async () => {
    const lock = new DeviceLock();
    const first = await lock.acquire();
    const second = lock.acquire();

    first();
    const releaseSecond = await second;
    first();
    expect(lock.locked).toBe(true);
    releaseSecond();
    expect(lock.locked).toBe(false);
  });
});
