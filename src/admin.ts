import type { Express, Request, Response, NextFunction } from "express";
import type { GameService } from "./service";

function getToken(req: Request): string | undefined {
  const h = req.get("authorization") || "";
  if (h.startsWith("Bearer ")) return h.slice(7);
  const q = req.query.token;
  return typeof q === "string" && q ? q : undefined;
}

export function requireAdmin(expected: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected) return res.status(500).send("ADMIN_TOKEN not configured on the server");
    if (getToken(req) !== expected) return res.status(401).send("Unauthorized");
    return next();
  };
}

export function mountAdmin(app: Express, service: GameService, adminToken: string | undefined) {
  app.get("/admin/games", requireAdmin(adminToken), (_req: Request, res: Response) => {
    res.json({ games: service.listGames() });
  });
}
