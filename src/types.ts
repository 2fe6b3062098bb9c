// A card cell is a number, or null for the FREE centre
export type Cell = number | null;

// 25 cells, row-major (index = row * 5 + col)
export type Card = Cell[];

// 25 booleans, same indexing as Card; FREE index is always true
export type Marks = boolean[];

// Random source returning values in [0, 1)
export type Rng = () => number;

export type Player = {
  // Caller-supplied, unique within a game
  userId: string;
  name: string;
  card: Card;
  marks: Marks;
  joinedAt: number;
};

export type Game = {
  gameId: string;
  hostId: string;
  createdAt: number;
  draws: number[];
  // players keyed by userId
  players: Map<string, Player>;
  winnerIds: string[];
  // Never set by current operations; every "or closed" guard still checks it
  closed: boolean;
};

export type GameSnapshot = {
  gameId: string;
  hostId: string;
  draws: number[];
  playersCount: number;
  winnerIds: string[];
  winnerNames: string[];
  closed: boolean;
  isHost: boolean;
  card: Card | null;
  marks: Marks | null;
  hasBingo: boolean;
};

export type DrawResult = { nextNumber: number; draws: number[] };

export type ClaimResult = { valid: boolean; winnerIds: string[]; winnerNames: string[] };

export type AutoDrawResult = { on: boolean; interval: number };

export type GameSummary = {
  gameId: string;
  hostId: string;
  players: number;
  draws: number;
  winners: number;
  closed: boolean;
  // Seconds between automatic draws, null when auto-draw is off
  autoDraw: number | null;
};

export const TOTAL_NUMBERS = 75;
export const CARD_CELLS = 25;
export const FREE_INDEX = 12;
export const MAX_PLAYERS = 400;
export const MAX_NAME_LENGTH = 64;
export const DEFAULT_AUTO_INTERVAL = 5;
export const MIN_AUTO_INTERVAL = 2;
export const MAX_AUTO_INTERVAL = 60;
