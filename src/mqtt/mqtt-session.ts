import mqtt from "mqtt";
import type { IClientOptions } from "mqtt";
import { brokerUrl } from "../config/load-config.js";
import type { MqttSettings } from "../config/types.js";

export type PublishOptions = {
  retain: boolean;
  qos?: 0 | 1;
};

export type SessionEvents = {
  connect: () => void;
  close: () => void;
  offline: () => void;
  reconnect: () => void;
  error: (error: Error) => void;
  message: (topic: string, payload: Buffer, retained: boolean) => void;
};

/** The slice of an MQTT client the supervisor drives. */
export interface BrokerSession {
  readonly connected: boolean;
  subscribe(topics: string[]): Promise<void>;
  publish(topic: string, payload: string | Buffer, options: PublishOptions): Promise<void>;
  end(): Promise<void>;
}

export type SessionFactory = (events: SessionEvents) => BrokerSession;

export type LastWill = {
  topic: string;
  payload: string;
};

function toClientOptions(settings: MqttSettings, will?: LastWill): IClientOptions {
  const options: IClientOptions = { reconnectPeriod: 5000, connectTimeout: 10_000 };
  if (settings.clientId) options.clientId = settings.clientId;
  if (settings.username) options.username = settings.username;
  if (settings.password) options.password = settings.password;
  if (will) options.will = { topic: will.topic, payload: Buffer.from(will.payload), qos: 0, retain: true };
  return options;
}

export function createMqttSessionFactory(settings: MqttSettings, will?: LastWill): SessionFactory {
  return (events) => {
    const client = mqtt.connect(brokerUrl(settings), toClientOptions(settings, will));

    client.on("connect", () => events.connect());
    client.on("close", () => events.close());
    client.on("offline", () => events.offline());
    client.on("reconnect", () => events.reconnect());
    client.on("error", (error) => events.error(error));
    client.on("message", (topic, payload, packet) => events.message(topic, payload, packet.retain));

    return {
      get connected() {
        return client.connected;
      },
      async subscribe(topics) {
        const grants = await client.subscribeAsync(topics, { qos: 0 });
        const rejected = grants.filter((grant) => grant.qos === 128).map((grant) => grant.topic);
        if (rejected.length > 0) {
          throw new Error(`Broker rejected subscriptions: ${rejected.join(", ")}`);
        }
      },
      async publish(topic, payload, options) {
        await client.publishAsync(topic, payload, { qos: options.qos ?? 0, retain: options.retain });
      },
      async end() {
        await client.endAsync();
      },
    };
  };
}
