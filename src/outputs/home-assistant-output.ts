import type { DisplayState, GameEntity } from "../core/entity-registry.js";
import type { Logger } from "../logger.js";
import type { ConnectionSupervisor } from "../mqtt/connection-supervisor.js";
import type { EntityPlatform, PlatformCallbacks, UserIntent } from "./output.js";

export type HomeAssistantOutputSettings = {
  topicBase: string;
  discoveryPrefix: string;
  bridgeTopicBase: string;
  coverContentType: string;
};

type MqttTransport = Pick<ConnectionSupervisor, "publish" | "addSubscription" | "onMessage" | "onSubscribed" | "getState">;

type DeviceInfo = {
  identifiers: string[];
  name: string;
  manufacturer: string;
  model: string;
};

const PAYLOAD_ON = "ON";
const PAYLOAD_OFF = "OFF";
const PAYLOAD_UNKNOWN = "None";

export function sanitizeId(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9_]+/g, "_").replace(/^_+|_+$/g, "");
}

function lastSegment(topicBase: string): string {
  const segments = topicBase.split("/");
  return segments[segments.length - 1] ?? topicBase;
}

/** `playnite/playniteweb_my_pc` → `Playniteweb My Pc` */
export function friendlyName(topicBase: string): string {
  return lastSegment(topicBase)
    .replace(/_/g, " ")
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => `${boundary}${letter.toUpperCase()}`);
}

export function nodeIdFor(topicBase: string): string {
  return sanitizeId(lastSegment(topicBase)) || "game_library";
}

export function bridgeTopicFor(settings: Pick<HomeAssistantOutputSettings, "topicBase" | "bridgeTopicBase">): string {
  return `${settings.bridgeTopicBase}/${nodeIdFor(settings.topicBase)}`;
}

export function availabilityTopicFor(settings: Pick<HomeAssistantOutputSettings, "topicBase" | "bridgeTopicBase">): string {
  return `${bridgeTopicFor(settings)}/availability`;
}

function parseIntent(payload: Buffer): UserIntent | null {
  const normalized = payload.toString("utf8").trim().toLowerCase();
  if (normalized === "on" || normalized === "true" || normalized === "1" || normalized === "start") return "start";
  if (normalized === "off" || normalized === "false" || normalized === "0" || normalized === "stop") return "stop";
  if (normalized === "install" || normalized === "uninstall") return normalized;
  return null;
}

function statePayload(state: DisplayState): string {
  if (state === "started") return PAYLOAD_ON;
  if (state === "stopped") return PAYLOAD_OFF;
  return PAYLOAD_UNKNOWN;
}

/**
 * Exposes every game as a Home Assistant switch plus a cover image entity via
 * MQTT discovery, and a button that asks the library agent for a snapshot.
 * Retained payloads are cached and replayed after every reconnect and every
 * Home Assistant restart.
 */
export class HomeAssistantOutput implements EntityPlatform {
  readonly id = "home-assistant";
  private readonly nodeId: string;
  private readonly bridgeTopic: string;
  private readonly device: DeviceInfo;
  private retainedPayloadCache = new Map<string, string | Buffer>();

  constructor(
    private readonly settings: HomeAssistantOutputSettings,
    private readonly transport: MqttTransport,
    private readonly callbacks: PlatformCallbacks,
    private readonly logger: Logger,
  ) {
    this.nodeId = nodeIdFor(settings.topicBase);
    this.bridgeTopic = bridgeTopicFor(settings);
    this.device = {
      identifiers: [this.nodeId],
      name: friendlyName(settings.topicBase),
      manufacturer: "Playnite Web",
      model: "Playnite Web MQTT",
    };
  }

  get availabilityTopic(): string {
    return `${this.bridgeTopic}/availability`;
  }

  gameCommandTopic(id: string): string {
    return `${this.bridgeTopic}/game/${id}/set`;
  }

  gameStateTopic(id: string): string {
    return `${this.bridgeTopic}/game/${id}/state`;
  }

  gameCoverTopic(id: string): string {
    return `${this.bridgeTopic}/game/${id}/cover`;
  }

  get libraryRequestTopic(): string {
    return `${this.bridgeTopic}/library/request`;
  }

  attach(): void {
    this.transport.addSubscription(`${this.bridgeTopic}/game/+/set`);
    this.transport.addSubscription(this.libraryRequestTopic);
    this.transport.addSubscription(`${this.settings.discoveryPrefix}/status`);
    this.transport.onMessage((topic, payload, retained) => this.handleMessage(topic, payload, retained));
    this.transport.onSubscribed(() => this.replayRetained());
    this.publishJsonRetained(`${this.settings.discoveryPrefix}/button/${this.nodeId}/request_library/config`, {
      name: "Request Game Library",
      unique_id: `${this.nodeId}_request_library`,
      command_topic: this.libraryRequestTopic,
      payload_press: "PRESS",
      icon: "mdi:refresh",
      ...this.availability(),
      device: this.device,
    });
  }

  announceEntity(entity: GameEntity): void {
    const objectId = `game_${sanitizeId(entity.id)}`;
    const name = entity.name ?? entity.id;

    this.publishJsonRetained(`${this.settings.discoveryPrefix}/switch/${this.nodeId}/${objectId}/config`, {
      name,
      unique_id: `${this.nodeId}_${objectId}`,
      command_topic: this.gameCommandTopic(entity.id),
      state_topic: this.gameStateTopic(entity.id),
      payload_on: PAYLOAD_ON,
      payload_off: PAYLOAD_OFF,
      state_on: PAYLOAD_ON,
      state_off: PAYLOAD_OFF,
      icon: "mdi:gamepad-variant",
      ...this.availability(),
      device: this.device,
    });

    this.publishJsonRetained(`${this.settings.discoveryPrefix}/image/${this.nodeId}/${objectId}_cover/config`, {
      name: `${name} Cover`,
      unique_id: `${this.nodeId}_${objectId}_cover`,
      image_topic: this.gameCoverTopic(entity.id),
      content_type: this.settings.coverContentType,
      ...this.availability(),
      device: this.device,
    });

    this.publishRetained(this.gameStateTopic(entity.id), statePayload(entity.displayState));
  }

  setState(id: string, state: DisplayState): void {
    this.publishRetained(this.gameStateTopic(id), statePayload(state));
  }

  setCover(id: string, bytes: Buffer, _contentType: string): void {
    this.publishRetained(this.gameCoverTopic(id), bytes);
  }

  /** Marks every entity unavailable. Only sent on a clean shutdown; the LWT covers the rest. */
  async announceOffline(): Promise<void> {
    if (this.transport.getState() !== "subscribed") return;
    const sent = await this.transport.publish(this.availabilityTopic, "offline", { retain: true });
    if (!sent) this.logger.warn({ topic: this.availabilityTopic }, "Could not announce offline");
  }

  private handleMessage(topic: string, payload: Buffer, retained: boolean): void {
    if (topic === `${this.settings.discoveryPrefix}/status`) {
      // The subscribe hook already replayed; a retained status adds nothing.
      if (!retained && payload.toString("utf8").trim() === "online") {
        this.logger.info("Home Assistant came online, republishing discovery");
        this.replayRetained();
      }
      return;
    }

    if (topic === this.libraryRequestTopic) {
      this.callbacks.onLibraryRefreshRequested();
      return;
    }

    const gamePrefix = `${this.bridgeTopic}/game/`;
    if (topic.startsWith(gamePrefix) && topic.endsWith("/set")) {
      const id = topic.slice(gamePrefix.length, -"/set".length);
      if (!id || id.includes("/")) return;
      const intent = parseIntent(payload);
      if (!intent) {
        this.logger.warn({ id, payload: payload.toString("utf8") }, "Unrecognized switch command");
        return;
      }
      if (!this.callbacks.onUserCommand(id, intent)) {
        this.logger.warn({ id, intent }, "Switch command for unknown game");
      }
    }
  }

  private availability(): Record<string, string> {
    return {
      availability_topic: this.availabilityTopic,
      payload_available: "online",
      payload_not_available: "offline",
    };
  }

  private replayRetained(): void {
    this.send(this.availabilityTopic, "online", true);
    for (const [topic, payload] of this.retainedPayloadCache.entries()) {
      this.send(topic, payload, true);
    }
  }

  private publishJsonRetained(topic: string, payload: unknown): void {
    const serialized = JSON.stringify(payload);
    if (this.retainedPayloadCache.get(topic) === serialized) return;
    this.publishRetained(topic, serialized);
  }

  private publishRetained(topic: string, payload: string | Buffer): void {
    this.retainedPayloadCache.set(topic, payload);
    if (this.transport.getState() !== "subscribed") return;
    this.send(topic, payload, true);
  }

  private send(topic: string, payload: string | Buffer, retain: boolean): void {
    this.transport.publish(topic, payload, { retain }).catch((error: unknown) => {
      this.logger.error({ topic, err: error }, "Home Assistant publish failed");
    });
  }
}
