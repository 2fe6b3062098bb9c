import { z } from "zod";
import { clampInterval } from "./autoDraw";
import { DEFAULT_AUTO_INTERVAL } from "./types";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().trim().min(1).default("0.0.0.0"),
  CORS_ORIGINS: z.string().trim().default("*"),
  REDIS_URL: z.string().trim().min(1).optional(),
  ADMIN_TOKEN: z.string().trim().min(1).optional(),
  AUTO_DRAW_INTERVAL: z.coerce.number().int().default(DEFAULT_AUTO_INTERVAL),
  BINGO_SEED: z.coerce.number().int().optional(),
});

export type Config = {
  port: number;
  host: string;
  // "*" or an explicit origin list
  corsOrigins: "*" | string[];
  redisUrl?: string;
  adminToken?: string;
  autoDrawInterval: number;
  seed?: number;
};

// Empty strings count as unset
function compact(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) if (v !== undefined && v.trim() !== "") out[k] = v;
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(compact(env));
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${msg}`);
  }
  const e = parsed.data;
  const origins = e.CORS_ORIGINS.split(",").map((s) => s.trim()).filter(Boolean);
  return {
    port: e.PORT,
    host: e.HOST,
    corsOrigins: origins.length === 0 || origins.includes("*") ? "*" : origins,
    redisUrl: e.REDIS_URL,
    adminToken: e.ADMIN_TOKEN,
    autoDrawInterval: clampInterval(e.AUTO_DRAW_INTERVAL),
    seed: e.BINGO_SEED,
  };
}
