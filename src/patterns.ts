import type { Card, Marks } from "./types";
import { FREE_INDEX } from "./types";

const idx = [0, 1, 2, 3, 4];

// 5 rows, 5 columns, 2 diagonals as flat cell indices
export const LINES: readonly number[][] = [
  ...idx.map((r) => idx.map((c) => r * 5 + c)),
  ...idx.map((c) => idx.map((r) => r * 5 + c)),
  [0, 6, 12, 18, 24],
  [4, 8, 12, 16, 20],
];

/** Any row, column or diagonal fully marked. */
export function checkLineBingo(marks: Marks): boolean {
  return LINES.some((line) => line.every((i) => marks[i] === true));
}

/**
 * Every marked cell other than FREE must hold a number that has been drawn.
 * Cells without a number are exempt.
 */
export function markedCellsAreValid(card: Card, marks: Marks, draws: readonly number[]): boolean {
  const drawn = new Set(draws);
  return marks.every((m, i) => {
    if (!m || i === FREE_INDEX) return true;
    const v = card[i];
    return v === null || drawn.has(v);
  });
}

export function isWinningClaim(card: Card, marks: Marks, draws: readonly number[]): boolean {
  return markedCellsAreValid(card, marks, draws) && checkLineBingo(marks);
}
