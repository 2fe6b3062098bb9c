import http from "http";
import { Server } from "socket.io";

import type { Config } from "./config";
import { createApp } from "./http";
import type { GameService } from "./service";
import { registerSocketHandlers } from "./socket";

/** HTTP server with the express app and Socket.IO attached, not yet listening. */
export function createBingoServer(service: GameService, config: Pick<Config, "corsOrigins" | "adminToken">) {
  const app = createApp(service, config);
  const server = http.createServer(app);
  const io = new Server(server, {
    cors: { origin: config.corsOrigins, methods: ["GET", "POST"] },
    transports: ["websocket", "polling"],
  });
  registerSocketHandlers(io, service);
  return { server, io };
}
