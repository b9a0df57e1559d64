import type { DisplayState, GameEntity } from "../core/entity-registry.js";
import type { WsHub } from "../ws/hub.js";
import { toGameSnapshot } from "../ws/protocol.js";
import type { EntityPlatform } from "./output.js";

/** Mirrors entity changes to connected WebSocket clients. */
export class WsOutput implements EntityPlatform {
  readonly id = "websocket";

  constructor(
    private readonly hub: WsHub,
    private readonly lookup: (id: string) => GameEntity | undefined,
  ) {}

  announceEntity(entity: GameEntity): void {
    this.hub.broadcast({ type: "game", payload: toGameSnapshot(entity) });
  }

  setState(id: string, _state: DisplayState): void {
    const entity = this.lookup(id);
    if (!entity) return;
    this.hub.broadcast({ type: "game", payload: toGameSnapshot(entity) });
  }

  setCover(id: string, bytes: Buffer, contentType: string): void {
    this.hub.broadcast({ type: "cover", payload: { id, contentType, size: bytes.length } });
  }
}
