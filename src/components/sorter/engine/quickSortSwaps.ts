import type { SortDirection, SwapEvent } from "../types";
import { belongsBefore } from "./direction";

function swap(values: number[], i: number, j: number) {
  const tmp = values[i];
  values[i] = values[j];
  values[j] = tmp;
}

/**
 * Lomuto partition of `values[low..high]`, yielding after every exchange
 * (self-swaps included). Returns the pivot's final index.
 */
function* partition(
  values: number[],
  low: number,
  high: number,
  direction: SortDirection,
): Generator<SwapEvent, number, undefined> {
  const pivot = values[high];
  let i = low - 1;

  for (let j = low; j < high; j++) {
    if (belongsBefore(values[j], pivot, direction)) {
      i++;
      swap(values, i, j);
      yield { i, j, sequence: values };
    }
  }

  swap(values, i + 1, high);
  yield { i: i + 1, j: high, sequence: values };
  return i + 1;
}

/**
 * Sorts `values` in place, one swap per iteration.
 * - Mutates the input array.
 * - Pivot is always the last element of the range.
 * - Ranges are taken from a worklist, low side first, so the swap order is
 *   the same as the recursive formulation.
 */
export function* quickSortSwaps(
  values: number[],
  direction: SortDirection,
): Generator<SwapEvent, void, undefined> {
  const ranges: Array<[number, number]> = [[0, values.length - 1]];

  while (ranges.length > 0) {
    const range = ranges.pop();
    if (!range) break;

    const [low, high] = range;
    if (low >= high) continue;

    const p = yield* partition(values, low, high, direction);

    // Pushed high first so the low side pops next.
    ranges.push([p + 1, high], [low, p - 1]);
  }
}
