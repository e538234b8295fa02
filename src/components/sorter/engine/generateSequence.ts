import { randomIntInclusive, type RandomSource } from "@/lib/random";
import { RESEED_THRESHOLD, VALUE_MAX, VALUE_MIN } from "./constants";

/**
 * Draws `count` values in [1, 1000]. If none landed at or below the reseed
 * threshold, one random slot is overwritten with a value in [1, 30] so the
 * grid always offers something clickable.
 *
 * `count` must already be a positive integer.
 */
export function generateSequence(count: number, random: RandomSource = Math.random): number[] {
  const values: number[] = [];
  let hasSmallValue = false;

  for (let i = 0; i < count; i++) {
    const v = randomIntInclusive(random, VALUE_MIN, VALUE_MAX);
    if (v <= RESEED_THRESHOLD) hasSmallValue = true;
    values.push(v);
  }

  if (!hasSmallValue && count > 0) {
    const slot = randomIntInclusive(random, 0, count - 1);
    values[slot] = randomIntInclusive(random, VALUE_MIN, RESEED_THRESHOLD);
  }

  return values;
}
