import { createClient, RedisClientType } from "redis";

export type RedisClient = RedisClientType;

// Attempts before connect() gives up
export const MAX_CONNECT_RETRIES = 5;

let client: RedisClient | null = null;

/**
 * Backoff between reconnects. Until the first successful connection it
 * stops after MAX_CONNECT_RETRIES so connect() rejects instead of hanging.
 */
export function reconnectStrategy(everConnected: () => boolean) {
  return (retries: number): number | Error => {
    if (!everConnected() && retries >= MAX_CONNECT_RETRIES) {
      return new Error(`Redis unreachable after ${retries} attempts`);
    }
    return Math.min(retries * 200, 2000);
  };
}

/** Connect a client; a rejected connect leaves it closed. */
export async function connectRedis(url: string): Promise<RedisClient> {
  let ready = false;
  const c: RedisClient = createClient({
    url,
    socket: { reconnectStrategy: reconnectStrategy(() => ready) },
  });
  c.on("error", (err) => console.error("Redis error:", err));
  c.on("ready", () => {
    ready = true;
  });
  await c.connect();
  return c;
}

/** Shared publisher connection for the Socket.IO adapter. */
export async function getRedis(url: string): Promise<RedisClient> {
  if (client) return client;
  client = await connectRedis(url);
  return client;
}

export async function closeRedis() {
  if (!client) return;
  const c = client;
  client = null;
  await c.quit();
}
