import type { Logger } from "../logger.js";

export type DisplayState = "stopped" | "started" | "unknown";
export type GameCommand = "start" | "stop";

export type PendingCommand = {
  command: GameCommand;
  issuedAt: number;
};

export type GameEntity = {
  id: string;
  name?: string;
  installed?: boolean;
  displayState: DisplayState;
  coverDigest?: string;
  pendingCommand?: PendingCommand;
  updatedAt: number;
};

export type GameRecord = {
  id: string;
  name?: string;
  state?: DisplayState;
  installed?: boolean;
};

export type CommandToken = {
  id: string;
  command: GameCommand;
  issuedAt: number;
};

export type RegistryEvent =
  | { type: "discovered"; entity: GameEntity }
  | { type: "updated"; entity: GameEntity }
  | { type: "state"; entity: GameEntity }
  | { type: "cover"; entity: GameEntity };

type RegistryListener = (event: RegistryEvent) => void;

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export function targetState(command: GameCommand): DisplayState {
  return command === "start" ? "started" : "stopped";
}

/**
 * Owns every known game and its synchronization state.
 *
 * All mutations are synchronous, so the event loop serializes writers. State is
 * last-write-wins: the upstream feed carries no sequence numbers. Entities are
 * never removed.
 */
export class EntityRegistry {
  private entities = new Map<string, GameEntity>();
  private listeners = new Set<RegistryListener>();

  constructor(
    private readonly logger: Logger,
    private readonly options: { commandTimeoutMs?: number; now?: () => number } = {},
  ) {}

  get(id: string): GameEntity | undefined {
    const entity = this.entities.get(id);
    return entity ? snapshot(entity) : undefined;
  }

  list(): GameEntity[] {
    return [...this.entities.values()].map(snapshot);
  }

  get size(): number {
    return this.entities.size;
  }

  upsertState(id: string, state: DisplayState): GameEntity {
    this.ensure(id);
    return this.confirmCommand(id, state);
  }

  upsertCover(id: string, digest: string): GameEntity {
    const entity = this.ensure(id);
    entity.coverDigest = digest;
    entity.updatedAt = this.now();
    this.emit({ type: "cover", entity: snapshot(entity) });
    return snapshot(entity);
  }

  upsertRelease(record: GameRecord): GameEntity {
    const entity = this.ensure(record.id);
    if (this.applyMetadata(entity, record)) {
      this.emit({ type: "updated", entity: snapshot(entity) });
    }
    if (record.state) {
      return this.confirmCommand(record.id, record.state);
    }
    return snapshot(entity);
  }

  /**
   * Applies a library snapshot. Entities missing from the snapshot are left as
   * they are. Returns the ids seen for the first time.
   */
  bulkUpsert(records: GameRecord[]): string[] {
    const discovered: string[] = [];
    for (const record of records) {
      if (!this.entities.has(record.id)) discovered.push(record.id);
      this.upsertRelease(record);
    }
    this.logger.info(
      { records: records.length, discovered: discovered.length, known: this.entities.size },
      "Library snapshot applied",
    );
    return discovered;
  }

  issueCommand(id: string, command: GameCommand): CommandToken | null {
    const entity = this.entities.get(id);
    if (!entity) {
      this.logger.warn({ id, command }, "Command for unknown game ignored");
      return null;
    }
    const issuedAt = this.now();
    entity.pendingCommand = { command, issuedAt };
    entity.displayState = targetState(command);
    entity.updatedAt = issuedAt;
    this.emit({ type: "state", entity: snapshot(entity) });
    return { id, command, issuedAt };
  }

  /** Authoritative state wins over any optimistic one and clears the pending command. */
  confirmCommand(id: string, observedState: DisplayState): GameEntity {
    const entity = this.ensure(id);
    const pending = entity.pendingCommand;
    if (pending && targetState(pending.command) !== observedState) {
      this.logger.info(
        { id, command: pending.command, observedState },
        "Optimistic state rolled back by observed state",
      );
    }
    const changed = entity.displayState !== observedState || pending !== undefined;
    entity.pendingCommand = undefined;
    entity.displayState = observedState;
    entity.updatedAt = this.now();
    if (changed) {
      this.emit({ type: "state", entity: snapshot(entity) });
    }
    return snapshot(entity);
  }

  /** Clears pending commands older than the timeout. Display state is kept. */
  expirePending(now = this.now()): string[] {
    const timeoutMs = this.options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    const expired: string[] = [];
    for (const entity of this.entities.values()) {
      const pending = entity.pendingCommand;
      if (!pending || now - pending.issuedAt < timeoutMs) continue;
      entity.pendingCommand = undefined;
      entity.updatedAt = now;
      expired.push(entity.id);
      this.emit({ type: "state", entity: snapshot(entity) });
      this.logger.debug(
        { id: entity.id, command: pending.command, ageMs: now - pending.issuedAt },
        "Pending command expired without confirmation",
      );
    }
    return expired;
  }

  subscribe(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private ensure(id: string): GameEntity {
    const existing = this.entities.get(id);
    if (existing) return existing;
    const entity: GameEntity = { id, displayState: "unknown", updatedAt: this.now() };
    this.entities.set(id, entity);
    this.logger.info({ id }, "Discovered game");
    this.emit({ type: "discovered", entity: snapshot(entity) });
    return entity;
  }

  private applyMetadata(entity: GameEntity, record: GameRecord): boolean {
    let changed = false;
    if (record.name !== undefined && record.name !== entity.name) {
      entity.name = record.name;
      changed = true;
    }
    if (record.installed !== undefined && record.installed !== entity.installed) {
      entity.installed = record.installed;
      changed = true;
    }
    if (changed) entity.updatedAt = this.now();
    return changed;
  }

  private emit(event: RegistryEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ err: error, event: event.type, id: event.entity.id }, "Registry listener failed");
      }
    }
  }

  private now(): number {
    return this.options.now ? this.options.now() : Date.now();
  }
}

function snapshot(entity: GameEntity): GameEntity {
  return {
    ...entity,
    pendingCommand: entity.pendingCommand ? { ...entity.pendingCommand } : undefined,
  };
}
