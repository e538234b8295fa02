import { afterEach, describe, expect, it, vi } from "vitest";
import { delay, runAnimatedSort } from "./runAnimatedSort";
import { INITIAL_DIRECTION, flipDirection } from "./direction";

const instant = async () => {};

describe("runAnimatedSort", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("sorts in place and notifies on every swap", async () => {
    const sequence = [500, 10, 999, 1, 700];
    const onSwap = vi.fn();

    const result = await runAnimatedSort(sequence, "descending", { onSwap, sleep: instant });

    expect(result).toEqual({ status: "completed", swaps: 4, direction: "descending" });
    expect(sequence).toEqual([999, 700, 500, 10, 1]);
    expect(onSwap).toHaveBeenCalledTimes(4);
    expect(onSwap).toHaveBeenNthCalledWith(1, { i: 0, j: 2, sequence });
  });

  it("pauses after each swap, self-swaps included", async () => {
    const sleep = vi.fn(instant);
    await runAnimatedSort([2, 1], "descending", { onSwap: () => {}, sleep, delayMs: 25 });

    // 2 > 1 moves onto itself, then the pivot swaps with itself
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(25, undefined);
  });

  it("never notifies for a single element", async () => {
    const sequence = [9];
    const onSwap = vi.fn();
    const result = await runAnimatedSort(sequence, "ascending", { onSwap, sleep: instant });

    expect(result.swaps).toBe(0);
    expect(onSwap).not.toHaveBeenCalled();
    expect(sequence).toEqual([9]);
  });

  it("alternates direction across runs when the caller flips it", async () => {
    let direction = INITIAL_DIRECTION;
    const data = [300, 20, 800, 5];

    const first = [...data];
    const r1 = await runAnimatedSort(first, direction, { onSwap: () => {}, sleep: instant });
    direction = flipDirection(r1.direction);

    const second = [...data];
    const r2 = await runAnimatedSort(second, direction, { onSwap: () => {}, sleep: instant });

    expect(r1.direction).toBe("descending");
    expect(first).toEqual([800, 300, 20, 5]);
    expect(r2.direction).toBe("ascending");
    expect(second).toEqual([5, 20, 300, 800]);
  });

  it("waits the configured delay between swaps", async () => {
    vi.useFakeTimers();
    const onSwap = vi.fn();
    const run = runAnimatedSort([2, 1], "descending", { onSwap, delayMs: 100 });

    expect(onSwap).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(99);
    expect(onSwap).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(onSwap).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(100);

    await expect(run).resolves.toEqual({ status: "completed", swaps: 2, direction: "descending" });
  });

  it("stops at the next pause once aborted", async () => {
    const controller = new AbortController();
    const sequence = [500, 10, 999, 1, 700];
    const onSwap = vi.fn();

    const result = await runAnimatedSort(sequence, "descending", {
      onSwap,
      signal: controller.signal,
      sleep: async () => controller.abort(),
    });

    expect(result).toEqual({ status: "cancelled", swaps: 1, direction: "descending" });
    expect(onSwap).toHaveBeenCalledTimes(1);
    expect(sequence).toEqual([999, 10, 500, 1, 700]);
  });

  it("does not touch the sequence when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const sequence = [3, 1, 2];

    const result = await runAnimatedSort(sequence, "ascending", {
      onSwap: () => {},
      signal: controller.signal,
    });

    expect(result).toEqual({ status: "cancelled", swaps: 0, direction: "ascending" });
    expect(sequence).toEqual([3, 1, 2]);
  });
});

describe("delay", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves early when its signal aborts", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const done = vi.fn();
    const pending = delay(10_000, controller.signal).then(done);

    controller.abort();
    await pending;

    expect(done).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });
});
