import type { DisplayState, GameCommand, GameEntity } from "../core/entity-registry.js";
import type { ConnectionState } from "../mqtt/connection-supervisor.js";
import type { UserIntent } from "../outputs/output.js";

export type GameSnapshot = {
  id: string;
  name: string | null;
  installed: boolean | null;
  displayState: DisplayState;
  pendingCommand: GameCommand | null;
  coverDigest: string | null;
  updatedAt: number;
};

export type ServerEvent =
  | { type: "games"; payload: GameSnapshot[] }
  | { type: "game"; payload: GameSnapshot }
  | { type: "cover"; payload: { id: string; contentType: string; size: number } }
  | { type: "connection"; payload: { state: ConnectionState } };

export type ClientEvent =
  | { type: UserIntent; payload: { id: string } }
  | { type: "refresh" };

const INTENTS: readonly UserIntent[] = ["start", "stop", "install", "uninstall"];

export function isUserIntent(value: unknown): value is UserIntent {
  return typeof value === "string" && INTENTS.some((intent) => intent === value);
}

export function toGameSnapshot(entity: GameEntity): GameSnapshot {
  return {
    id: entity.id,
    name: entity.name ?? null,
    installed: entity.installed ?? null,
    displayState: entity.displayState,
    pendingCommand: entity.pendingCommand?.command ?? null,
    coverDigest: entity.coverDigest ?? null,
    updatedAt: entity.updatedAt,
  };
}

export function parseClientEvent(raw: string): ClientEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("type" in parsed)) return null;
  const type = parsed.type;
  if (type === "refresh") return { type: "refresh" };
  if (!isUserIntent(type) || !("payload" in parsed)) return null;
  const payload = parsed.payload;
  if (typeof payload !== "object" || payload === null || !("id" in payload) || typeof payload.id !== "string") {
    return null;
  }
  return { type, payload: { id: payload.id } };
}
