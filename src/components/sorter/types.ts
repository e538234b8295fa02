export type SortDirection = "descending" | "ascending";

export type SwapEvent = {
  i: number;
  j: number;
  sequence: number[]; // live backing array, already swapped
};

export type SortRunStatus = "completed" | "cancelled";

export type SortRunResult = {
  status: SortRunStatus;
  swaps: number;
  direction: SortDirection; // the direction this run sorted in
};

export type ParseResult<E extends string> =
  | { ok: true; value: number }
  | { ok: false; error: E; message: string };

export type CountError = "InvalidCount";
export type SelectionError = "SelectionTooLarge";
