import type { RuntimeConfig } from "../config/types.js";
import type { Logger } from "../logger.js";
import { ConnectionSupervisor } from "../mqtt/connection-supervisor.js";
import type { ConnectionState } from "../mqtt/connection-supervisor.js";
import type { SessionFactory } from "../mqtt/mqtt-session.js";
import { HomeAssistantOutput } from "../outputs/home-assistant-output.js";
import { OutputFanout } from "../outputs/output-fanout.js";
import type { EntityPlatform, PlatformCallbacks } from "../outputs/output.js";
import { WsOutput } from "../outputs/ws-output.js";
import { WsHub } from "../ws/hub.js";
import { CommandDispatcher } from "./command-dispatcher.js";
import { CoverPipeline } from "./cover-pipeline.js";
import { EntityRegistry } from "./entity-registry.js";
import type { ImageCodec } from "./image-transcoder.js";
import { TopicRouter } from "./topic-router.js";
import type { RouterDiagnostics } from "./topic-router.js";

export type BridgeStatus = {
  connection: ConnectionState;
  topicBase: string;
  subscriptions: string[];
  games: number;
  websocketClients: number;
  router: RouterDiagnostics;
};

export type GameBridgeDeps<TImage> = {
  config: RuntimeConfig;
  logger: Logger;
  createSession: SessionFactory;
  codec: ImageCodec<TImage>;
  extraOutputs?: EntityPlatform[];
  now?: () => number;
  publishRetryDelayMs?: number;
};

/** Wires router, registry, cover pipeline, dispatcher and outputs around one broker connection. */
export class GameBridge<TImage> {
  readonly registry: EntityRegistry;
  readonly supervisor: ConnectionSupervisor;
  readonly dispatcher: CommandDispatcher;
  readonly router: TopicRouter;
  readonly covers: CoverPipeline<TImage>;
  readonly hub: WsHub;
  readonly homeAssistant: HomeAssistantOutput | null;
  private expiryTimer: NodeJS.Timeout | null = null;

  constructor(private readonly deps: GameBridgeDeps<TImage>) {
    const { config, logger } = deps;
    const child = (module: string): Logger => logger.child({ module });

    this.registry = new EntityRegistry(child("registry"), {
      commandTimeoutMs: config.commandTimeoutMs,
      now: deps.now,
    });
    this.supervisor = new ConnectionSupervisor(config.mqtt.topicBase, deps.createSession, child("supervisor"), {
      retryDelayMs: deps.publishRetryDelayMs,
    });
    this.dispatcher = new CommandDispatcher(
      config.mqtt.requestTopicBase,
      this.supervisor,
      this.registry,
      child("dispatcher"),
    );

    const callbacks: PlatformCallbacks = {
      onUserCommand: (id, intent) => this.dispatcher.request(id, intent),
      onLibraryRefreshRequested: () => this.dispatcher.requestLibraryRefresh(),
    };

    this.hub = new WsHub(child("ws"));
    const outputs: EntityPlatform[] = [new WsOutput(this.hub, (id) => this.registry.get(id))];
    this.homeAssistant = config.homeAssistant.enabled
      ? new HomeAssistantOutput(
          {
            topicBase: config.mqtt.topicBase,
            discoveryPrefix: config.homeAssistant.discoveryPrefix,
            bridgeTopicBase: config.homeAssistant.bridgeTopicBase,
            coverContentType: deps.codec.contentType,
          },
          this.supervisor,
          callbacks,
          child("home-assistant"),
        )
      : null;
    if (this.homeAssistant) outputs.push(this.homeAssistant);
    outputs.push(...(deps.extraOutputs ?? []));
    const platform = new OutputFanout(outputs, child("outputs"));

    this.covers = new CoverPipeline(
      this.registry,
      platform,
      deps.codec,
      {
        maxSizeBytes: config.images.maxImageSize,
        minQuality: config.images.minQuality,
        initialQuality: config.images.initialQuality,
      },
      child("covers"),
    );

    this.router = new TopicRouter(
      config.mqtt.topicBase,
      {
        onState: (id, state) => {
          this.registry.upsertState(id, state);
        },
        onRelease: (record) => {
          this.registry.upsertRelease(record);
        },
        onCover: async (id, raw) => {
          await this.covers.handleCover(id, raw);
        },
        onSnapshot: (records) => {
          this.registry.bulkUpsert(records);
        },
        onRemoteOnline: () => this.dispatcher.requestLibraryRefresh(),
      },
      child("router"),
    );

    this.registry.subscribe((event) => {
      switch (event.type) {
        case "discovered":
        case "updated":
          platform.announceEntity(event.entity);
          break;
        case "state":
          platform.setState(event.entity.id, event.entity.displayState);
          break;
        case "cover":
          break;
      }
    });

    this.homeAssistant?.attach();
    this.supervisor.onMessage(async (topic, payload, retained) => {
      await this.router.route(topic, payload, retained);
    });
    this.supervisor.onSubscribed(() => this.dispatcher.requestLibraryRefresh());
    this.supervisor.onStateChange((state) => {
      this.hub.broadcast({ type: "connection", payload: { state } });
    });
  }

  start(): void {
    this.supervisor.start();
    if (this.expiryTimer) return;
    this.expiryTimer = setInterval(() => {
      this.registry.expirePending();
    }, this.deps.config.expiryTickMs);
    this.expiryTimer.unref();
  }

  async stop(): Promise<void> {
    if (this.expiryTimer) {
      clearInterval(this.expiryTimer);
      this.expiryTimer = null;
    }
    await this.homeAssistant?.announceOffline();
    await this.supervisor.stop();
  }

  status(): BridgeStatus {
    return {
      connection: this.supervisor.getState(),
      topicBase: this.deps.config.mqtt.topicBase,
      subscriptions: this.supervisor.subscriptions(),
      games: this.registry.size,
      websocketClients: this.hub.clientCount,
      router: this.router.getDiagnostics(),
    };
  }
}
