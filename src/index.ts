import { Server } from "socket.io";
import { createAdapter } from "@socket.io/redis-adapter";

import { loadConfig, Config } from "./config";
import { createRng } from "./game";
import { closeRedis, connectRedis, getRedis, RedisClient } from "./redis";
import { createBingoServer } from "./server";
import { GameService } from "./service";

async function setupAdapter(io: Server, config: Config): Promise<RedisClient | null> {
  if (!config.redisUrl) {
    console.warn("REDIS_URL not set. Running without Socket.IO Redis adapter.");
    return null;
  }
  const pub = await getRedis(config.redisUrl);
  let sub: RedisClient;
  try {
    sub = await connectRedis(config.redisUrl);
  } catch (e) {
    await closeRedis();
    throw e;
  }
  io.adapter(createAdapter(pub, sub));
  console.log("✅ Socket.IO Redis adapter enabled");
  return sub;
}

function main() {
  const config = loadConfig();
  const service = new GameService({
    rng: config.seed === undefined ? Math.random : createRng(config.seed),
    defaultInterval: config.autoDrawInterval,
  });
  const { server, io } = createBingoServer(service, config);

  let sub: RedisClient | null = null;
  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`${signal} received, shutting down`);
    service.shutdown();
    io.close(() => {
      Promise.all([sub?.quit(), closeRedis()])
        .catch((e) => console.error("Redis close failed", e))
        .finally(() => process.exit(0));
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  server.listen(config.port, config.host, () => {
    console.log(`✅ Bingo server on ${config.host}:${config.port}`);
  });

  // Broadcasts stay local until (and unless) the adapter is attached
  setupAdapter(io, config)
    .then((s) => {
      sub = s;
    })
    .catch((e) => console.error("❌ Redis adapter setup failed, broadcasting locally", e));
}

try {
  main();
} catch (e) {
  console.error("❌ Startup failed", e);
  process.exit(1);
}
