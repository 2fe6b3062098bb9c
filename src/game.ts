import { Card, FREE_INDEX, Marks, Rng, TOTAL_NUMBERS, CARD_CELLS } from "./types";

// ---- Deterministic PRNG (xorshift32) ----
// Seed is coerced to a 32-bit non-zero integer.
export function createRng(seed: number): Rng {
  let x = ((seed | 0) ^ 0x9E3779B9) || 1;
  return function rnd() {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    // >>> 0 makes it unsigned, / 2^32 to [0,1)
    return (x >>> 0) / 4294967296;
  };
}

// ---- Fisher–Yates shuffle ----
export function shuffle<T>(arr: readonly T[], rnd: Rng = Math.random): T[] {
  const a = arr.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(rnd() * (i + 1));
    const tmp = a[i];
    a[i] = a[j];
    a[j] = tmp;
  }
  return a;
}

// Classic US Bingo ranges
const RANGES: Record<"B" | "I" | "N" | "G" | "O", [number, number]> = {
  B: [1, 15],
  I: [16, 30],
  N: [31, 45],
  G: [46, 60],
  O: [61, 75],
};
const COLUMNS = ["B", "I", "N", "G", "O"] as const;

function pickKFromRange(k: number, lo: number, hi: number, rnd: Rng): number[] {
  const pool = Array.from({ length: hi - lo + 1 }, (_, i) => lo + i);
  return shuffle(pool, rnd).slice(0, k);
}

// Create a 5x5 card, flattened row-major; FREE centre is null
export function makeCard(rnd: Rng = Math.random): Card {
  const cols = COLUMNS.map((c) => pickKFromRange(5, ...RANGES[c], rnd));
  const card: Card = [];
  for (let r = 0; r < 5; r++) {
    for (let c = 0; c < 5; c++) card.push(cols[c][r]);
  }
  card[FREE_INDEX] = null;
  return card;
}

export function newMarks(): Marks {
  const m: Marks = Array(CARD_CELLS).fill(false);
  m[FREE_INDEX] = true;
  return m;
}

export function remainingNumbers(draws: readonly number[]): number[] {
  const drawn = new Set(draws);
  const out: number[] = [];
  for (let n = 1; n <= TOTAL_NUMBERS; n++) if (!drawn.has(n)) out.push(n);
  return out;
}

/**
 * Uniform choice among undrawn numbers; shared by manual and automatic draws.
 * Returns null once the pool is empty.
 */
export function pickNext(draws: readonly number[], rnd: Rng = Math.random): number | null {
  const rem = remainingNumbers(draws);
  if (!rem.length) return null;
  return rem[Math.floor(rnd() * rem.length)];
}
