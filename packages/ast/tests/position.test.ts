import { describe, expect, test } from "vitest";
import { ROW_CEILING } from "@helena/syntax";
import { nextPosition } from "../src/index.ts";

describe("nextPosition", () => {
  test("advances the row by the length of the consumed text", () => {
    expect(nextPosition({ column: 1, row: 0 }, "func")).toEqual({
      column: 1,
      row: 4,
    });
    expect(nextPosition({ column: 3, row: 7 }, ", ")).toEqual({
      column: 3,
      row: 9,
    });
  });

  test("collapses rows past the ceiling onto it", () => {
    expect(nextPosition({ column: 1, row: 98 }, "func")).toEqual({
      column: 1,
      row: ROW_CEILING,
    });
    expect(nextPosition({ column: 1, row: ROW_CEILING }, "x")).toEqual({
      column: 1,
      row: ROW_CEILING,
    });
  });

  test("keeps the column for any non-empty text, line breaks included", () => {
    expect(nextPosition({ column: 1, row: 12 }, "\n")).toEqual({
      column: 1,
      row: 13,
    });
  });

  test("advances the column only when the next row is 0", () => {
    expect(nextPosition({ column: 2, row: 0 }, "")).toEqual({
      column: 3,
      row: 0,
    });
    expect(nextPosition({ column: 0, row: 0 }, "")).toEqual({
      column: 0,
      row: 0,
    });
  });
});
