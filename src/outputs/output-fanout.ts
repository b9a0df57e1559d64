import type { DisplayState, GameEntity } from "../core/entity-registry.js";
import type { Logger } from "../logger.js";
import type { EntityPlatform } from "./output.js";

export class OutputFanout implements EntityPlatform {
  readonly id = "fanout";

  constructor(
    private readonly outputs: EntityPlatform[],
    private readonly logger: Logger,
  ) {}

  announceEntity(entity: GameEntity): void {
    this.each("announceEntity", entity.id, (output) => output.announceEntity(entity));
  }

  setState(id: string, state: DisplayState): void {
    this.each("setState", id, (output) => output.setState(id, state));
  }

  setCover(id: string, bytes: Buffer, contentType: string): void {
    this.each("setCover", id, (output) => output.setCover(id, bytes, contentType));
  }

  private each(operation: string, entityId: string, call: (output: EntityPlatform) => void): void {
    for (const output of this.outputs) {
      try {
        call(output);
      } catch (error) {
        this.logger.error({ err: error, output: output.id, operation, entityId }, "Output failed");
      }
    }
  }
}
