import express, { Request, Response } from "express";
import cors from "cors";
import { z } from "zod";
import { mountAdmin } from "./admin";
import type { Config } from "./config";
import { GameError, HTTP_STATUS } from "./errors";
import type { GameService } from "./service";
import { CARD_CELLS, DEFAULT_AUTO_INTERVAL, MAX_AUTO_INTERVAL, MIN_AUTO_INTERVAL } from "./types";

// Ids are kept exactly as sent; only blank ones are refused
const id = z
  .string()
  .max(128)
  .refine((s) => s.trim().length > 0, "must not be blank");

export const CreateGameBody = z.object({ host_id: id, host_name: z.string() });
export const JoinBody = z.object({ user_id: id, name: z.string() });
export const UserBody = z.object({ user_id: id });
export const MarkBody = z.object({
  user_id: id,
  index: z.number().int().min(0).max(CARD_CELLS - 1),
  marked: z.boolean(),
});
export const AutoBody = z.object({
  user_id: id,
  on: z.boolean(),
  interval: z.number().int().min(MIN_AUTO_INTERVAL).max(MAX_AUTO_INTERVAL).default(DEFAULT_AUTO_INTERVAL),
});

export class BadRequest extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super("Invalid request");
  }
}

export function parse<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const p = schema.safeParse(data);
  if (!p.success) throw new BadRequest(p.error.issues);
  return p.data;
}

type JsonReply = { status(code: number): { json(body: unknown): unknown } };

/** Translate a thrown error into a JSON response. */
export function sendError(res: JsonReply, e: unknown) {
  if (e instanceof GameError) return res.status(HTTP_STATUS[e.kind]).json({ detail: e.message });
  if (e instanceof BadRequest) return res.status(422).json({ detail: e.issues });
  console.error("Unhandled request error:", e);
  return res.status(500).json({ detail: "Internal error" });
}

const route = (fn: (req: Request) => unknown) => (req: Request, res: Response) => {
  try {
    res.json(fn(req));
  } catch (e) {
    sendError(res, e);
  }
};

export function createApp(service: GameService, config: Pick<Config, "corsOrigins" | "adminToken">) {
  const app = express();
  app.use(cors({ origin: config.corsOrigins, methods: ["GET", "POST"] }));
  app.use(express.json());
  mountAdmin(app, service, config.adminToken);

  app.get("/", (_req, res) => res.send("Bingo Server OK"));

  app.post(
    "/games",
    route((req) => {
      const b = parse(CreateGameBody, req.body);
      return { game_id: service.createGame(b.host_id, b.host_name) };
    })
  );

  app.post(
    "/games/:gid/join",
    route((req) => {
      const b = parse(JoinBody, req.body);
      service.joinGame(req.params.gid, b.user_id, b.name);
      return { ok: true };
    })
  );

  // Manual draw; caller id comes in the query string
  app.post(
    "/games/:gid/draw",
    route((req) => {
      const q = parse(UserBody, req.query);
      const r = service.drawNumber(req.params.gid, q.user_id);
      return { next_number: r.nextNumber, draws: r.draws };
    })
  );

  app.post(
    "/games/:gid/mark",
    route((req) => {
      const b = parse(MarkBody, req.body);
      service.markCell(req.params.gid, b.user_id, b.index, b.marked);
      return { ok: true };
    })
  );

  app.post(
    "/games/:gid/state",
    route((req) => {
      const b = parse(UserBody, req.body);
      const s = service.getState(req.params.gid, b.user_id);
      return {
        game_id: s.gameId,
        host_id: s.hostId,
        draws: s.draws,
        players_count: s.playersCount,
        winner_ids: s.winnerIds,
        winner_names: s.winnerNames,
        closed: s.closed,
        is_host: s.isHost,
        card: s.card,
        marks: s.marks,
        has_bingo: s.hasBingo,
      };
    })
  );

  app.post(
    "/games/:gid/claim",
    route((req) => {
      const b = parse(UserBody, req.body);
      const r = service.claimBingo(req.params.gid, b.user_id);
      return { valid: r.valid, winner_ids: r.winnerIds, winner_names: r.winnerNames };
    })
  );

  app.post(
    "/games/:gid/auto",
    route((req) => {
      const b = parse(AutoBody, req.body);
      const r = service.setAutoDraw(req.params.gid, b.user_id, b.on, b.interval);
      return { ok: true, on: r.on, interval: r.interval };
    })
  );

  return app;
}
