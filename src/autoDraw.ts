import { DEFAULT_AUTO_INTERVAL, MAX_AUTO_INTERVAL, MIN_AUTO_INTERVAL } from "./types";

export const clampInterval = (n: number) =>
  Number.isFinite(n)
    ? Math.max(MIN_AUTO_INTERVAL, Math.min(MAX_AUTO_INTERVAL, Math.floor(n)))
    : DEFAULT_AUTO_INTERVAL;

type Control = {
  timer: NodeJS.Timeout;
  // seconds; read when the next wait is scheduled
  interval: number;
};

/**
 * Runs one draw for the game. Returns false when the game can no longer
 * draw (gone, closed or exhausted), which ends its scheduler.
 */
export type DrawTick = (gameId: string) => boolean;

/**
 * One timer per game. A running timer is retuned, never duplicated.
 */
export class AutoDrawScheduler {
  private readonly controls = new Map<string, Control>();

  constructor(private readonly tick: DrawTick) {}

  start(gameId: string, requested: number) {
    const interval = clampInterval(requested);
    const existing = this.controls.get(gameId);
    if (existing) {
      existing.interval = interval;
      return;
    }
    this.controls.set(gameId, { timer: this.schedule(gameId, interval), interval });
  }

  stop(gameId: string) {
    const c = this.controls.get(gameId);
    if (!c) return;
    clearTimeout(c.timer);
    this.controls.delete(gameId);
  }

  stopAll() {
    for (const c of this.controls.values()) clearTimeout(c.timer);
    this.controls.clear();
  }

  isActive(gameId: string): boolean {
    return this.controls.has(gameId);
  }

  intervalOf(gameId: string): number | null {
    return this.controls.get(gameId)?.interval ?? null;
  }

  get activeCount() {
    return this.controls.size;
  }

  private schedule(gameId: string, interval: number): NodeJS.Timeout {
    return setTimeout(() => this.fire(gameId), interval * 1000);
  }

  private fire(gameId: string) {
    const c = this.controls.get(gameId);
    if (!c) return;
    let keepGoing = false;
    try {
      keepGoing = this.tick(gameId);
    } catch (e) {
      console.error(`Auto-draw for ${gameId} failed:`, e);
    }
    if (!keepGoing) {
      this.controls.delete(gameId);
      return;
    }
    c.timer = this.schedule(gameId, c.interval);
  }
}
