import type { SortDirection, SortRunResult, SwapEvent } from "../types";
import { SWAP_DELAY_MS } from "./constants";
import { quickSortSwaps } from "./quickSortSwaps";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type AnimatedSortOptions = {
  onSwap: (event: SwapEvent) => void;
  delayMs?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
};

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const delay: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Runs the quicksort over `sequence` in place, calling `onSwap` after every
 * exchange and pausing `delayMs` before the next one.
 *
 * Aborting `signal` ends the run at its next pause with status "cancelled";
 * no further writes reach `sequence` after that. The caller owns the
 * direction toggle and should only flip it for a completed run.
 */
export async function runAnimatedSort(
  sequence: number[],
  direction: SortDirection,
  { onSwap, delayMs = SWAP_DELAY_MS, signal, sleep = delay }: AnimatedSortOptions,
): Promise<SortRunResult> {
  let swaps = 0;

  if (signal?.aborted) return { status: "cancelled", swaps, direction };

  for (const event of quickSortSwaps(sequence, direction)) {
    swaps++;
    onSwap(event);

    await sleep(delayMs, signal);
    if (signal?.aborted) return { status: "cancelled", swaps, direction };
  }

  return { status: "completed", swaps, direction };
}
