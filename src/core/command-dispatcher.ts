import type { Logger } from "../logger.js";
import type { UserIntent } from "../outputs/output.js";
import type { EntityRegistry, GameCommand } from "./entity-registry.js";

/** What the dispatcher needs from the connection: a fire-and-forget publish. */
export interface CommandPublisher {
  publish(topic: string, payload: string): Promise<boolean>;
}

export function commandTopic(requestTopicBase: string, intent: UserIntent): string {
  return `${requestTopicBase}/request/game/${intent}`;
}

export function libraryRequestTopic(requestTopicBase: string): string {
  return `${requestTopicBase}/request/library`;
}

/**
 * Turns user intents into request messages for the library agent. Start and
 * stop flip the registry state optimistically; the agent's next state message
 * confirms or corrects it.
 */
export class CommandDispatcher {
  constructor(
    private readonly requestTopicBase: string,
    private readonly publisher: CommandPublisher,
    private readonly registry: EntityRegistry,
    private readonly logger: Logger,
  ) {}

  requestStart(id: string): boolean {
    return this.requestGameCommand(id, "start");
  }

  requestStop(id: string): boolean {
    return this.requestGameCommand(id, "stop");
  }

  requestInstall(id: string): boolean {
    return this.requestLifecycle(id, "install");
  }

  requestUninstall(id: string): boolean {
    return this.requestLifecycle(id, "uninstall");
  }

  request(id: string, intent: UserIntent): boolean {
    switch (intent) {
      case "start":
        return this.requestStart(id);
      case "stop":
        return this.requestStop(id);
      case "install":
        return this.requestInstall(id);
      case "uninstall":
        return this.requestUninstall(id);
    }
  }

  requestLibraryRefresh(): void {
    this.logger.info("Requesting game library");
    this.send(libraryRequestTopic(this.requestTopicBase), "");
  }

  private requestGameCommand(id: string, command: GameCommand): boolean {
    const token = this.registry.issueCommand(id, command);
    if (!token) return false;
    this.logger.info({ id, command }, "Game command issued");
    this.send(commandTopic(this.requestTopicBase, command), id);
    return true;
  }

  private requestLifecycle(id: string, intent: "install" | "uninstall"): boolean {
    if (!this.registry.get(id)) {
      this.logger.warn({ id, intent }, "Request for unknown game ignored");
      return false;
    }
    this.logger.info({ id, intent }, "Game request issued");
    this.send(commandTopic(this.requestTopicBase, intent), id);
    return true;
  }

  private send(topic: string, payload: string): void {
    this.publisher.publish(topic, payload).then(
      (delivered) => {
        if (!delivered) this.logger.warn({ topic }, "Request was not delivered to the broker");
      },
      (error: unknown) => {
        this.logger.error({ topic, err: error }, "Request publish failed");
      },
    );
  }
}
