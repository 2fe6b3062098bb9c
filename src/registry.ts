import { randomBytes } from "crypto";
import type { Game } from "./types";

// 6 random bytes -> 8 URL-safe characters
export const makeGameId = () => randomBytes(6).toString("base64url");

/**
 * In-memory games keyed by id. Entries live for the process lifetime.
 */
export class GameRegistry {
  private readonly games = new Map<string, Game>();

  constructor(private readonly genId: () => string = makeGameId) {}

  /** Fresh id not used by any game in the registry. */
  newId(): string {
    let id = this.genId();
    while (this.games.has(id)) id = this.genId();
    return id;
  }

  get(gameId: string): Game | undefined {
    return this.games.get(gameId);
  }

  put(game: Game) {
    this.games.set(game.gameId, game);
  }

  list(): Game[] {
    return Array.from(this.games.values());
  }

  get size() {
    return this.games.size;
  }
}
