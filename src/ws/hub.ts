import type { Logger } from "../logger.js";
import { parseClientEvent } from "./protocol.js";
import type { ClientEvent, ServerEvent } from "./protocol.js";

type EventHandler = (event: ClientEvent) => void;
export type WebSocketLike = {
  OPEN: number;
  readyState: number;
  send: (payload: string) => void;
  on: (event: "message" | "close", listener: (data: unknown) => void) => void;
};

export class WsHub {
  private sockets = new Set<WebSocketLike>();

  constructor(private readonly logger: Logger) {}

  get clientCount(): number {
    return this.sockets.size;
  }

  addClient(socket: WebSocketLike, onEvent: EventHandler): void {
    this.sockets.add(socket);
    this.logger.debug({ clients: this.sockets.size }, "WebSocket client added");

    socket.on("message", (raw: unknown) => {
      const event = parseClientEvent(String(raw));
      if (!event) {
        this.logger.debug({ raw: String(raw) }, "Ignoring malformed client event");
        return;
      }
      this.logger.debug({ event }, "Client event");
      onEvent(event);
    });

    socket.on("close", () => {
      this.sockets.delete(socket);
      this.logger.debug({ clients: this.sockets.size }, "WebSocket client closed");
    });
  }

  send(socket: WebSocketLike, event: ServerEvent): void {
    if (socket.readyState === socket.OPEN) {
      socket.send(JSON.stringify(event));
    }
  }

  broadcast(event: ServerEvent): void {
    const payload = JSON.stringify(event);
    for (const socket of this.sockets) {
      if (socket.readyState === socket.OPEN) {
        socket.send(payload);
      }
    }
  }
}
