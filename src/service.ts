import { AutoDrawScheduler, clampInterval } from "./autoDraw";
import { forbidden, invalidArgument, invalidState, notFound } from "./errors";
import { makeCard, newMarks, pickNext } from "./game";
import { isWinningClaim } from "./patterns";
import { GameRegistry } from "./registry";
import {
  AutoDrawResult,
  CARD_CELLS,
  ClaimResult,
  DEFAULT_AUTO_INTERVAL,
  DrawResult,
  FREE_INDEX,
  Game,
  GameSnapshot,
  GameSummary,
  MAX_NAME_LENGTH,
  MAX_PLAYERS,
  Player,
  Rng,
  TOTAL_NUMBERS,
} from "./types";

export type DrawListener = (gameId: string, n: number, draws: number[]) => void;

export type GameServiceOptions = {
  rng?: Rng;
  registry?: GameRegistry;
  // Interval used when a game is created
  defaultInterval?: number;
  onDraw?: DrawListener;
  now?: () => number;
};

/**
 * Game operations. Each method runs synchronously to completion on the event
 * loop, so it is one critical section over the registry and the auto-draw
 * controls; scheduler ticks contend for the same loop.
 * Every method validates before it writes.
 */
export class GameService {
  readonly registry: GameRegistry;
  readonly scheduler: AutoDrawScheduler;
  private readonly rng: Rng;
  private readonly defaultInterval: number;
  private readonly now: () => number;
  private onDraw?: DrawListener;

  constructor(opts: GameServiceOptions = {}) {
    this.rng = opts.rng ?? Math.random;
    this.registry = opts.registry ?? new GameRegistry();
    this.defaultInterval = clampInterval(opts.defaultInterval ?? DEFAULT_AUTO_INTERVAL);
    this.now = opts.now ?? Date.now;
    this.onDraw = opts.onDraw;
    this.scheduler = new AutoDrawScheduler((gameId) => this.autoDrawTick(gameId));
  }

  /** Replace the draw listener (the realtime layer is built after the service). */
  setDrawListener(fn: DrawListener | undefined) {
    this.onDraw = fn;
  }

  createGame(hostId: string, hostName: string): string {
    const gameId = this.registry.newId();
    const game: Game = {
      gameId,
      hostId,
      createdAt: this.now(),
      draws: [],
      players: new Map(),
      winnerIds: [],
      closed: false,
    };
    game.players.set(hostId, this.makePlayer(hostId, hostName));
    this.registry.put(game);
    this.scheduler.start(gameId, this.defaultInterval);
    return gameId;
  }

  joinGame(gameId: string, userId: string, name: string) {
    const g = this.openGame(gameId);
    if (g.players.has(userId)) return;
    if (g.players.size >= MAX_PLAYERS) throw forbidden(`Game is full (${MAX_PLAYERS})`);
    g.players.set(userId, this.makePlayer(userId, name));
  }

  drawNumber(gameId: string, userId: string): DrawResult {
    const g = this.openGame(gameId);
    if (userId !== g.hostId) throw forbidden("Only host can draw");
    if (g.draws.length >= TOTAL_NUMBERS) throw invalidState("All numbers drawn");
    const next = pickNext(g.draws, this.rng);
    if (next === null) throw invalidState("No numbers remaining");
    this.appendDraw(g, next);
    return { nextNumber: next, draws: [...g.draws] };
  }

  markCell(gameId: string, userId: string, index: number, marked: boolean) {
    const g = this.registry.get(gameId);
    if (!g) throw notFound("Game not found");
    const p = g.players.get(userId);
    if (!p) throw notFound("Player not in game");
    if (!Number.isInteger(index) || index < 0 || index >= CARD_CELLS) {
      throw invalidArgument(`Cell index must be an integer in [0, ${CARD_CELLS - 1}]`);
    }
    // FREE stays marked
    p.marks[index] = index === FREE_INDEX ? true : marked;
  }

  getState(gameId: string, userId: string): GameSnapshot {
    const g = this.registry.get(gameId);
    if (!g) throw notFound("Game not found");
    const p = g.players.get(userId);
    return {
      gameId: g.gameId,
      hostId: g.hostId,
      draws: [...g.draws],
      playersCount: g.players.size,
      winnerIds: [...g.winnerIds],
      winnerNames: winnerNames(g),
      closed: g.closed,
      isHost: userId === g.hostId,
      card: p ? [...p.card] : null,
      marks: p ? [...p.marks] : null,
      hasBingo: p ? isWinningClaim(p.card, p.marks, g.draws) : false,
    };
  }

  claimBingo(gameId: string, userId: string): ClaimResult {
    const g = this.openGame(gameId);
    const p = g.players.get(userId);
    if (!p) throw notFound("Player not in game");
    const valid = isWinningClaim(p.card, p.marks, g.draws);
    if (valid && !g.winnerIds.includes(userId)) g.winnerIds.push(userId);
    return { valid, winnerIds: [...g.winnerIds], winnerNames: winnerNames(g) };
  }

  setAutoDraw(gameId: string, userId: string, on: boolean, interval = DEFAULT_AUTO_INTERVAL): AutoDrawResult {
    const g = this.registry.get(gameId);
    if (!g) throw notFound("Game not found");
    if (userId !== g.hostId) throw forbidden("Only host can change auto-draw");
    const applied = clampInterval(interval);
    if (on) this.scheduler.start(gameId, applied);
    else this.scheduler.stop(gameId);
    return { on, interval: applied };
  }

  summarize(gameId: string): GameSummary {
    const g = this.registry.get(gameId);
    if (!g) throw notFound("Game not found");
    return {
      gameId: g.gameId,
      hostId: g.hostId,
      players: g.players.size,
      draws: g.draws.length,
      winners: g.winnerIds.length,
      closed: g.closed,
      autoDraw: this.scheduler.intervalOf(g.gameId),
    };
  }

  listGames(): GameSummary[] {
    return this.registry.list().map((g) => this.summarize(g.gameId));
  }

  /** Stop every auto-draw timer; called on process shutdown. */
  shutdown() {
    this.scheduler.stopAll();
  }

  private autoDrawTick(gameId: string): boolean {
    const g = this.registry.get(gameId);
    if (!g || g.closed || g.draws.length >= TOTAL_NUMBERS) return false;
    const next = pickNext(g.draws, this.rng);
    if (next === null) return false;
    this.appendDraw(g, next);
    return true;
  }

  private appendDraw(g: Game, n: number) {
    g.draws.push(n);
    this.onDraw?.(g.gameId, n, [...g.draws]);
  }

  private openGame(gameId: string): Game {
    const g = this.registry.get(gameId);
    if (!g || g.closed) throw notFound("Game not found or closed");
    return g;
  }

  private makePlayer(userId: string, name: string): Player {
    return {
      userId,
      // by code point, so a surrogate pair is never split
      name: Array.from(name).slice(0, MAX_NAME_LENGTH).join(""),
      card: makeCard(this.rng),
      marks: newMarks(),
      joinedAt: this.now(),
    };
  }
}

function winnerNames(g: Game): string[] {
  const names: string[] = [];
  for (const id of g.winnerIds) {
    const p = g.players.get(id);
    if (p) names.push(p.name);
  }
  return names;
}
