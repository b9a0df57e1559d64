import type { DisplayState, GameEntity } from "../core/entity-registry.js";

export type UserIntent = "start" | "stop" | "install" | "uninstall";

/** Where synchronized entities are pushed. Implementations must not throw on unknown ids. */
export interface EntityPlatform {
  readonly id: string;
  announceEntity(entity: GameEntity): void;
  setState(id: string, state: DisplayState): void;
  setCover(id: string, bytes: Buffer, contentType: string): void;
}

/** Calls a platform makes back into the bridge. */
export type PlatformCallbacks = {
  onUserCommand: (id: string, intent: UserIntent) => boolean;
  onLibraryRefreshRequested: () => void;
};
