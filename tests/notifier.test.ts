import { describe, expect, it, vi } from "vitest";
import { notifyStatus } from "../src/core/notifier.js";

describe("notifyStatus", () => {
  it("does nothing without a notifier", async () => {
    await expect(notifyStatus(undefined, "hello")).resolves.toBeUndefined();
  });

  it("calls a synchronous notifier once", async () => {
    const sync = vi.fn((_text: string) => undefined);

    await notifyStatus(sync, "hello");

    expect(sync).toHaveBeenCalledWith("hello");
  });

  it("waits for an async notifier to settle", async () => {
    let finished = false;
    const notifier = async (_text: string) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      finished = true;
    };

    await notifyStatus(notifier, "hello");

    expect(finished).toBe(true);
  });

  it("swallows synchronous throws and rejections", async () => {
    await expect(
      notifyStatus(() => {
        throw new Error("sync failure");
      }, "x")
    ).resolves.toBeUndefined();

    await expect(notifyStatus(() => Promise.reject(new Error("async failure")), "x")).resolves.toBeUndefined();
  });
});
