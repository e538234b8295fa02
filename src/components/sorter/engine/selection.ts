import * as z from "zod";
import type { CountError, SelectionError, ParseResult } from "../types";
import { MAX_COUNT, RESEED_THRESHOLD } from "./constants";

export const INVALID_COUNT_MESSAGE = "Please enter a valid positive integer.";
export const SELECTION_TOO_LARGE_MESSAGE = `Please select a value smaller or equal to ${RESEED_THRESHOLD}.`;

const countSchema = z
  .string()
  .trim()
  .regex(/^\+?\d+$/, INVALID_COUNT_MESSAGE)
  .transform(Number)
  .pipe(
    z
      .number()
      .int(INVALID_COUNT_MESSAGE)
      .min(1, INVALID_COUNT_MESSAGE)
      .max(MAX_COUNT, `Please enter at most ${MAX_COUNT} numbers.`),
  );

export function parseCount(raw: string): ParseResult<CountError> {
  const parsed = countSchema.safeParse(raw);
  if (parsed.success) return { ok: true, value: parsed.data };

  return {
    ok: false,
    error: "InvalidCount",
    message: parsed.error.issues[0]?.message ?? INVALID_COUNT_MESSAGE,
  };
}

/** A clicked value becomes the next count, if it is small enough. */
export function checkReseedSelection(value: number): ParseResult<SelectionError> {
  if (value <= RESEED_THRESHOLD) return { ok: true, value };
  return { ok: false, error: "SelectionTooLarge", message: SELECTION_TOO_LARGE_MESSAGE };
}
