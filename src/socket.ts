import type { Server, Socket } from "socket.io";
import { z } from "zod";
import { GameError } from "./errors";
import type { GameService } from "./service";
import { CARD_CELLS, DEFAULT_AUTO_INTERVAL, MAX_AUTO_INTERVAL, MIN_AUTO_INTERVAL } from "./types";

// Ids are kept exactly as sent; only blank ones are refused
const id = z
  .string()
  .max(128)
  .refine((s) => s.trim().length > 0, "must not be blank");

const CreateSchema = z.object({ userId: id, name: z.string() });
const JoinSchema = z.object({ gameId: id, userId: id, name: z.string() });
const UserSchema = z.object({ gameId: id, userId: id });
const WatchSchema = z.object({ gameId: id });
const MarkSchema = z.object({
  gameId: id,
  userId: id,
  index: z.number().int().min(0).max(CARD_CELLS - 1),
  marked: z.boolean(),
});
const AutoSchema = z.object({
  gameId: id,
  userId: id,
  on: z.boolean(),
  interval: z.number().int().min(MIN_AUTO_INTERVAL).max(MAX_AUTO_INTERVAL).default(DEFAULT_AUTO_INTERVAL),
});

type Reply = { ok: true } & Record<string, unknown>;
type Fail = { ok: false; msg: string; kind?: string };
type Callback = (r: Reply | Fail) => void;

/**
 * Runs a handler and answers through the acknowledgement, if the client sent one.
 */
export function respond<T extends z.ZodTypeAny>(
  schema: T,
  payload: unknown,
  cb: Callback | undefined,
  fn: (data: z.infer<T>) => Record<string, unknown>
) {
  const p = schema.safeParse(payload);
  if (!p.success) return cb?.({ ok: false, msg: "Invalid payload", kind: "InvalidArgument" });
  try {
    cb?.({ ...fn(p.data), ok: true });
  } catch (e) {
    if (e instanceof GameError) return cb?.({ ok: false, msg: e.message, kind: e.kind });
    console.error("Unhandled socket error:", e);
    cb?.({ ok: false, msg: "Internal error" });
  }
}

export function registerSocketHandlers(io: Server, service: GameService) {
  // Manual and automatic draws both land here
  service.setDrawListener((gameId, n, draws) => {
    io.to(gameId).emit("game:called", { n, history: draws });
  });

  io.on("connection", (socket: Socket) => {
    socket.on("game:create", (payload: unknown, cb?: Callback) =>
      respond(CreateSchema, payload, cb, (d) => {
        const gameId = service.createGame(d.userId, d.name);
        void socket.join(gameId);
        return { gameId };
      })
    );

    socket.on("game:join", (payload: unknown, cb?: Callback) =>
      respond(JoinSchema, payload, cb, (d) => {
        service.joinGame(d.gameId, d.userId, d.name);
        void socket.join(d.gameId);
        io.to(d.gameId).emit("room:updated", service.summarize(d.gameId));
        return {};
      })
    );

    socket.on("game:watch", (payload: unknown, cb?: Callback) =>
      respond(WatchSchema, payload, cb, (d) => {
        const summary = service.summarize(d.gameId);
        void socket.join(d.gameId);
        return { summary };
      })
    );

    socket.on("game:state", (payload: unknown, cb?: Callback) =>
      respond(UserSchema, payload, cb, (d) => ({ state: service.getState(d.gameId, d.userId) }))
    );

    socket.on("host:draw", (payload: unknown, cb?: Callback) =>
      respond(UserSchema, payload, cb, (d) => {
        const r = service.drawNumber(d.gameId, d.userId);
        return { nextNumber: r.nextNumber, draws: r.draws };
      })
    );

    socket.on("host:auto", (payload: unknown, cb?: Callback) =>
      respond(AutoSchema, payload, cb, (d) => {
        const r = service.setAutoDraw(d.gameId, d.userId, d.on, d.interval);
        return { on: r.on, interval: r.interval };
      })
    );

    socket.on("player:mark", (payload: unknown, cb?: Callback) =>
      respond(MarkSchema, payload, cb, (d) => {
        service.markCell(d.gameId, d.userId, d.index, d.marked);
        return {};
      })
    );

    socket.on("player:claim", (payload: unknown, cb?: Callback) =>
      respond(UserSchema, payload, cb, (d) => {
        const before = service.getState(d.gameId, d.userId).winnerIds.length;
        const r = service.claimBingo(d.gameId, d.userId);
        if (r.winnerIds.length > before) {
          io.to(d.gameId).emit("room:winners", { winnerIds: r.winnerIds, winnerNames: r.winnerNames });
        }
        return { valid: r.valid, winnerIds: r.winnerIds, winnerNames: r.winnerNames };
      })
    );
  });
}
