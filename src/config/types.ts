export type ImageFormat = "jpeg" | "webp";

export type MqttSettings = {
  broker: string;
  port: number;
  username?: string;
  password?: string;
  clientId?: string;
  topicBase: string;
  requestTopicBase: string;
};

export type ImageSettings = {
  maxImageSize: number;
  minQuality: number;
  initialQuality: number;
  format: ImageFormat;
};

export type HomeAssistantSettings = {
  enabled: boolean;
  discoveryPrefix: string;
  bridgeTopicBase: string;
};

export type HttpSettings = {
  port: number;
  host: string;
};

export type RuntimeConfig = {
  mqtt: MqttSettings;
  images: ImageSettings;
  homeAssistant: HomeAssistantSettings;
  commandTimeoutMs: number;
  expiryTickMs: number;
  http: HttpSettings;
};
