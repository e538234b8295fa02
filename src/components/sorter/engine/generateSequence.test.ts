import { describe, expect, it } from "vitest";
import { createSeededRandom } from "@/lib/random";
import { drawFor, randomForValues, scriptedRandom } from "@/test/scriptedRandom";
import { generateSequence } from "./generateSequence";

describe("generateSequence", () => {
  it("keeps the drawn values when one is already small", () => {
    // Throws on a sixth draw, so the fix-up step must not run.
    const random = randomForValues([500, 10, 999, 1, 700]);
    expect(generateSequence(5, random)).toEqual([500, 10, 999, 1, 700]);
  });

  it("overwrites one slot when no value is at or below 30", () => {
    const random = scriptedRandom([
      drawFor(500, 1, 1000),
      drawFor(600, 1, 1000),
      drawFor(700, 1, 1000),
      drawFor(1, 0, 2), // slot
      drawFor(7, 1, 30), // replacement
    ]);
    expect(generateSequence(3, random)).toEqual([500, 7, 700]);
  });

  it("returns a single small value for count 1", () => {
    const random = scriptedRandom([drawFor(800, 1, 1000), drawFor(0, 0, 0), drawFor(12, 1, 30)]);
    expect(generateSequence(1, random)).toEqual([12]);
  });

  it.each([1, 2, 10, 75, 400])("always returns %i values in range with one reseed trigger", (count) => {
    const random = createSeededRandom(count * 31);
    for (let round = 0; round < 20; round++) {
      const values = generateSequence(count, random);
      expect(values).toHaveLength(count);
      expect(values.every((v) => Number.isInteger(v) && v >= 1 && v <= 1000)).toBe(true);
      expect(values.some((v) => v <= 30)).toBe(true);
    }
  });
});
