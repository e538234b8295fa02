import { describe, expect, it } from "vitest";
import { INVALID_COUNT_MESSAGE, SELECTION_TOO_LARGE_MESSAGE, checkReseedSelection, parseCount } from "./selection";

describe("parseCount", () => {
  it("accepts positive integers with surrounding whitespace", () => {
    expect(parseCount(" 12 ")).toEqual({ ok: true, value: 12 });
    expect(parseCount("007")).toEqual({ ok: true, value: 7 });
  });

  it("accepts a leading plus sign", () => {
    expect(parseCount("+5")).toEqual({ ok: true, value: 5 });
    expect(parseCount(" +12 ")).toEqual({ ok: true, value: 12 });
  });

  it.each(["", "   ", "abc", "0", "+0", "+", "-3", "2.5", "1e3", "12abc", "++5"])("rejects %j", (raw) => {
    expect(parseCount(raw)).toEqual({ ok: false, error: "InvalidCount", message: INVALID_COUNT_MESSAGE });
  });

  it("rejects counts the grid cannot hold", () => {
    expect(parseCount("2001")).toEqual({
      ok: false,
      error: "InvalidCount",
      message: "Please enter at most 2000 numbers.",
    });
    expect(parseCount("2000")).toEqual({ ok: true, value: 2000 });
  });
});

describe("checkReseedSelection", () => {
  it("turns a small value into the next count", () => {
    expect(checkReseedSelection(30)).toEqual({ ok: true, value: 30 });
    expect(checkReseedSelection(1)).toEqual({ ok: true, value: 1 });
  });

  it("rejects values above the threshold", () => {
    expect(checkReseedSelection(31)).toEqual({
      ok: false,
      error: "SelectionTooLarge",
      message: SELECTION_TOO_LARGE_MESSAGE,
    });
    expect(SELECTION_TOO_LARGE_MESSAGE).toBe("Please select a value smaller or equal to 30.");
  });
});
