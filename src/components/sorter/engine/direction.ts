import type { SortDirection } from "../types";

export const INITIAL_DIRECTION: SortDirection = "descending";

export function flipDirection(direction: SortDirection): SortDirection {
  return direction === "descending" ? "ascending" : "descending";
}

/** True when `value` belongs on the low side of `pivot`. */
export function belongsBefore(value: number, pivot: number, direction: SortDirection) {
  return direction === "descending" ? value > pivot : value < pivot;
}
