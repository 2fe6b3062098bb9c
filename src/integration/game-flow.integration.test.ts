import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createRng } from "../game";
import { GameService } from "../service";

describe("integration: game with auto-draw", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("draws on a timer, retunes, stops and runs out", () => {
    const onDraw = vi.fn();
    const service = new GameService({ rng: createRng(7), onDraw });
    const gid = service.createGame("h", "Host");
    service.joinGame(gid, "p1", "Player1");

    vi.advanceTimersByTime(5000);
    const first = service.getState(gid, "p1").draws;
    expect(first).toHaveLength(1);
    expect(onDraw).toHaveBeenCalledWith(gid, first[0], first);

    // the pending five-second wait finishes, later waits take two seconds
    expect(service.setAutoDraw(gid, "h", true, 2)).toEqual({ on: true, interval: 2 });
    vi.advanceTimersByTime(5000);
    expect(service.getState(gid, "h").draws).toHaveLength(2);
    vi.advanceTimersByTime(2000);
    expect(service.getState(gid, "h").draws).toHaveLength(3);

    service.setAutoDraw(gid, "h", false, 2);
    vi.advanceTimersByTime(60_000);
    expect(service.getState(gid, "h").draws).toHaveLength(3);

    // manual draws mix with timed ones without repeats
    service.drawNumber(gid, "h");
    service.setAutoDraw(gid, "h", true, 2);
    vi.advanceTimersByTime(2000 * 80);

    const draws = service.getState(gid, "h").draws;
    expect(draws).toHaveLength(75);
    expect(new Set(draws).size).toBe(75);
    expect(service.scheduler.isActive(gid)).toBe(false);
    expect(onDraw).toHaveBeenCalledTimes(75);
  });

  it("lets a player win while numbers are called automatically", () => {
    const service = new GameService({ rng: createRng(11) });
    const gid = service.createGame("h", "Host");
    service.joinGame(gid, "p1", "Player1");
    const card = service.getState(gid, "p1").card ?? [];
    // middle column runs through the free cell
    const column = [2, 7, 12, 17, 22];
    const needed = column.map((i) => card[i]).filter((v): v is number => v !== null);

    service.setAutoDraw(gid, "h", true, 2);
    while (!needed.every((v) => service.getState(gid, "p1").draws.includes(v))) {
      vi.advanceTimersByTime(2000);
    }
    for (const i of column) service.markCell(gid, "p1", i, true);

    expect(service.claimBingo(gid, "p1")).toEqual({
      valid: true,
      winnerIds: ["p1"],
      winnerNames: ["Player1"],
    });
    expect(service.getState(gid, "h").winnerNames).toEqual(["Player1"]);
    service.shutdown();
    expect(service.scheduler.activeCount).toBe(0);
  });

  it("stops every game on shutdown", () => {
    const service = new GameService();
    const a = service.createGame("h1", "Host1");
    const b = service.createGame("h2", "Host2");
    service.shutdown();
    vi.advanceTimersByTime(60_000);
    expect(service.getState(a, "h1").draws).toEqual([]);
    expect(service.getState(b, "h2").draws).toEqual([]);
  });
});
