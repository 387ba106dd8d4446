import { describe, it, expect, afterEach, vi } from "vitest";
import { settleWithin, sleep } from "../utils/timing";

describe("settleWithin", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("reports work that resolves in time", async () => {
    await expect(settleWithin(Promise.resolve("done"), 1_000)).resolves.toBe(true);
  });

  it("counts a rejection as settled", async () => {
    await expect(settleWithin(Promise.reject(new Error("task failed")), 1_000)).resolves.toBe(true);
  });

  it("gives up once the timeout elapses", async () => {
    vi.useFakeTimers();
    const pending = settleWithin(new Promise<void>(() => undefined), 100);

    await vi.advanceTimersByTimeAsync(100);

    await expect(pending).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("clears its timer when the work wins", async () => {
    vi.useFakeTimers();
    const work = sleep(50);
    const settled = settleWithin(work, 1_000);

    await vi.advanceTimersByTimeAsync(50);

    await expect(settled).resolves.toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });
});
