import { setTimeout as delay } from "node:timers/promises";
import { asErrorMessage } from "../core/errors.js";
import type { Logger } from "../logger.js";
import type { BrokerSession, PublishOptions, SessionFactory } from "./mqtt-session.js";

export type ConnectionState = "disconnected" | "connecting" | "subscribed";

export type MessageHandler = (topic: string, payload: Buffer, retained: boolean) => void | Promise<void>;
type SubscribedHook = () => void | Promise<void>;
type StateListener = (state: ConnectionState) => void;

const DEFAULT_PUBLISH_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 500;
const DEFAULT_SUBSCRIBE_RETRY_DELAY_MS = 5_000;

export type SupervisorOptions = {
  publishAttempts?: number;
  retryDelayMs?: number;
  subscribeRetryDelayMs?: number;
};

/**
 * Owns the broker session. Every (re)connect replays the whole subscription set
 * from the wildcard root and then runs the subscribed hooks. Inbound messages
 * are handled one at a time, in arrival order.
 */
export class ConnectionSupervisor {
  private session: BrokerSession | null = null;
  private state: ConnectionState = "disconnected";
  private extraTopics = new Set<string>();
  private messageHandlers = new Set<MessageHandler>();
  private subscribedHooks = new Set<SubscribedHook>();
  private stateListeners = new Set<StateListener>();
  private inbound: Promise<void> = Promise.resolve();
  private connectGeneration = 0;

  constructor(
    private readonly topicBase: string,
    private readonly createSession: SessionFactory,
    private readonly logger: Logger,
    private readonly options: SupervisorOptions = {},
  ) {}

  get wildcardTopic(): string {
    return `${this.topicBase}/#`;
  }

  getState(): ConnectionState {
    return this.state;
  }

  subscriptions(): string[] {
    return [this.wildcardTopic, ...this.extraTopics];
  }

  addSubscription(topic: string): void {
    if (topic === this.wildcardTopic || this.extraTopics.has(topic)) return;
    this.extraTopics.add(topic);
    if (this.state !== "subscribed" || !this.session) return;
    this.session.subscribe([topic]).catch((error: unknown) => {
      this.logger.error({ topic, error: asErrorMessage(error) }, "Subscribe failed");
    });
  }

  onMessage(handler: MessageHandler): () => void {
    this.messageHandlers.add(handler);
    return () => {
      this.messageHandlers.delete(handler);
    };
  }

  onSubscribed(hook: SubscribedHook): () => void {
    this.subscribedHooks.add(hook);
    return () => {
      this.subscribedHooks.delete(hook);
    };
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  start(): void {
    if (this.session) return;
    this.setState("connecting");
    this.session = this.createSession({
      connect: () => {
        void this.handleConnect();
      },
      close: () => this.setState("disconnected"),
      offline: () => this.setState("disconnected"),
      reconnect: () => this.setState("connecting"),
      error: (error) => {
        this.logger.error({ error: error.message }, "MQTT client error");
      },
      message: (topic, payload, retained) => this.enqueue(topic, payload, retained),
    });
  }

  async stop(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = null;
    try {
      await session.end();
    } finally {
      this.setState("disconnected");
    }
  }

  /** Resolves once every message received so far has been handled. */
  drain(): Promise<void> {
    return this.inbound;
  }

  /** Fire-and-forget publish. Resolves `false` when the message could not be delivered to the client. */
  async publish(topic: string, payload: string | Buffer, options: PublishOptions = { retain: false }): Promise<boolean> {
    const session = this.session;
    if (!session || !session.connected) {
      this.logger.warn({ topic, state: this.state }, "Not connected, dropping publish");
      return false;
    }

    const attempts = this.options.publishAttempts ?? DEFAULT_PUBLISH_ATTEMPTS;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        await session.publish(topic, payload, options);
        this.logger.debug({ topic, retain: options.retain, size: payload.length }, "Published");
        return true;
      } catch (error) {
        this.logger.error({ topic, attempt, error: asErrorMessage(error) }, "Publish failed");
        if (attempt < attempts) await delay(this.options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
      }
    }
    return false;
  }

  /**
   * Subscribes until the broker accepts, then enters `subscribed`. Gives up
   * silently once the session drops or a newer connect takes over.
   */
  private async handleConnect(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.connectGeneration += 1;
    const generation = this.connectGeneration;
    const isCurrent = (): boolean =>
      this.session === session && session.connected && this.connectGeneration === generation;

    for (let attempt = 1; ; attempt += 1) {
      const topics = this.subscriptions();
      try {
        await session.subscribe(topics);
        break;
      } catch (error) {
        this.logger.error({ topics, attempt, error: asErrorMessage(error) }, "Subscribing after connect failed");
      }
      if (!isCurrent()) return;
      await delay(this.options.subscribeRetryDelayMs ?? DEFAULT_SUBSCRIBE_RETRY_DELAY_MS);
      if (!isCurrent()) return;
    }

    if (!isCurrent()) {
      this.logger.info("Connection dropped while subscribing");
      return;
    }
    this.setState("subscribed");
    for (const hook of this.subscribedHooks) {
      try {
        await hook();
      } catch (error) {
        this.logger.error({ error: asErrorMessage(error) }, "Subscribed hook failed");
      }
    }
  }

  private enqueue(topic: string, payload: Buffer, retained: boolean): void {
    this.inbound = this.inbound.then(() => this.dispatch(topic, payload, retained));
  }

  private async dispatch(topic: string, payload: Buffer, retained: boolean): Promise<void> {
    for (const handler of this.messageHandlers) {
      try {
        await handler(topic, payload, retained);
      } catch (error) {
        this.logger.error({ topic, error: asErrorMessage(error) }, "Message handler failed");
      }
    }
  }

  private setState(next: ConnectionState): void {
    if (this.state === next) return;
    const previous = this.state;
    this.state = next;
    this.logger.info({ from: previous, to: next }, "Connection state changed");
    for (const listener of this.stateListeners) {
      listener(next);
    }
  }
}
