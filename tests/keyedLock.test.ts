import { afterEach, describe, expect, it, vi } from "vitest";
import { KeyedLock } from "../src/memory/keyedLock.js";
import { LockTimeoutError } from "../src/errors.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("KeyedLock", () => {
  it("grants the lock immediately when free and frees it on release", async () => {
    const locks = new KeyedLock();

    const release = await locks.acquire("a", 100);
    expect(locks.isLocked("a")).toBe(true);

    release();
    expect(locks.isLocked("a")).toBe(false);
  });

  it("hands the lock to waiters one at a time", async () => {
    const locks = new KeyedLock();
    const order: string[] = [];

    const first = await locks.acquire("a", 1_000);
    const second = locks.acquire("a", 1_000).then((release) => {
      order.push("second");
      return release;
    });
    expect(locks.pending("a")).toBe(1);

    order.push("first");
    first();
    const releaseSecond = await second;
    expect(locks.isLocked("a")).toBe(true);

    releaseSecond();
    expect(order).toEqual(["first", "second"]);
    expect(locks.isLocked("a")).toBe(false);
  });

  it("does not block other keys", async () => {
    const locks = new KeyedLock();

    await locks.acquire("a", 100);
    const releaseB = await locks.acquire("b", 100);

    expect(locks.isLocked("b")).toBe(true);
    releaseB();
  });

  it("rejects a waiter with LockTimeoutError after the bounded wait", async () => {
    vi.useFakeTimers();
    const locks = new KeyedLock();
    await locks.acquire("subject-1", 50);

    const waiting = locks.acquire("subject-1", 50).catch((err: unknown) => err);
    await vi.advanceTimersByTimeAsync(60);
    const err = await waiting;

    expect(err).toBeInstanceOf(LockTimeoutError);
    if (err instanceof LockTimeoutError) {
      expect(err.subjectId).toBe("subject-1");
      expect(err.timeoutMs).toBe(50);
    }
    expect(locks.pending("subject-1")).toBe(0);
  });

  it("releases through withLock even when the operation throws", async () => {
    const locks = new KeyedLock();

    await expect(
      locks.withLock("a", 100, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(locks.isLocked("a")).toBe(false);
  });

  it("ignores a second call to the same release", async () => {
    const locks = new KeyedLock();
    const first = await locks.acquire("a", 100);
    const second = locks.acquire("a", 100);

    first();
    const releaseSecond = await second;
    first();

    expect(locks.isLocked("a")).toBe(true);
    releaseSecond();
  });
});
