import Fastify from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import type { GameBridge } from "../core/game-bridge.js";
import type { Logger } from "../logger.js";
import type { ClientEvent } from "../ws/protocol.js";
import { toGameSnapshot } from "../ws/protocol.js";
import { registerRoutes } from "./routes.js";
import type { BridgeServer } from "./routes.js";

export async function buildServer<TImage>(bridge: GameBridge<TImage>, logger: Logger): Promise<BridgeServer> {
  const app = Fastify({ loggerInstance: logger });
  await app.register(cors, { origin: true });
  await app.register(websocket);

  await registerRoutes(app, { bridge });

  const handleClientEvent = (event: ClientEvent): void => {
    if (event.type === "refresh") {
      bridge.dispatcher.requestLibraryRefresh();
      return;
    }
    if (!bridge.dispatcher.request(event.payload.id, event.type)) {
      app.log.warn({ id: event.payload.id, intent: event.type }, "WebSocket command for unknown game");
    }
  };

  app.get("/ws", { websocket: true }, (socket) => {
    bridge.hub.addClient(socket, handleClientEvent);
    bridge.hub.send(socket, { type: "games", payload: bridge.registry.list().map(toGameSnapshot) });
    bridge.hub.send(socket, { type: "connection", payload: { state: bridge.supervisor.getState() } });
  });

  return app;
}
