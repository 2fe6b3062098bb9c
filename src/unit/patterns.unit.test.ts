import { describe, expect, it } from "vitest";
import { checkLineBingo, isWinningClaim, LINES, markedCellsAreValid } from "../patterns";
import type { Card } from "../types";

function marksAt(indices: number[]): boolean[] {
  const m = Array<boolean>(25).fill(false);
  for (const i of indices) m[i] = true;
  return m;
}

// 1..25 row-major with the free centre
const card: Card = Array.from({ length: 25 }, (_, i) => (i === 12 ? null : i + 1));

describe("unit: line bingo", () => {
  it("has 12 lines", () => {
    expect(LINES).toHaveLength(12);
  });

  it("accepts a full top row", () => {
    expect(checkLineBingo(marksAt([0, 1, 2, 3, 4]))).toBe(true);
  });

  it("accepts a column and the anti-diagonal through the free cell", () => {
    expect(checkLineBingo(marksAt([2, 7, 12, 17, 22]))).toBe(true);
    expect(checkLineBingo(marksAt([4, 8, 12, 16, 20]))).toBe(true);
  });

  it("rejects a diagonal missing one cell", () => {
    expect(checkLineBingo(marksAt([0, 6, 12, 18]))).toBe(false);
  });

  it("rejects scattered marks", () => {
    expect(checkLineBingo(marksAt([0, 1, 2, 3, 9, 12]))).toBe(false);
  });
});

describe("unit: marked cell validity", () => {
  it("passes when every marked number is drawn", () => {
    expect(markedCellsAreValid(card, marksAt([0, 1, 12]), [1, 2, 40])).toBe(true);
  });

  it("fails when a marked number was never drawn", () => {
    expect(markedCellsAreValid(card, marksAt([0, 1]), [1])).toBe(false);
  });

  it("ignores the free cell", () => {
    expect(markedCellsAreValid(card, marksAt([12]), [])).toBe(true);
  });

  it("needs both a line and drawn numbers to win", () => {
    const row = marksAt([0, 1, 2, 3, 4, 12]);
    expect(isWinningClaim(card, row, [1, 2, 3, 4, 5])).toBe(true);
    expect(isWinningClaim(card, row, [1, 2, 3, 4])).toBe(false);
    expect(isWinningClaim(card, marksAt([0, 1, 12]), [1, 2])).toBe(false);
  });
});
