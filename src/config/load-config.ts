import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { ConfigError, asErrorMessage } from "../core/errors.js";
import type { ImageFormat, RuntimeConfig } from "./types.js";

export const DEFAULT_CONFIG_PATH = "data/config.json";
export const DEFAULT_MQTT_PORT = 1883;
export const DEFAULT_MAX_IMAGE_SIZE = 14500;
export const DEFAULT_MIN_QUALITY = 60;
export const DEFAULT_INITIAL_QUALITY = 95;
export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;
export const DEFAULT_EXPIRY_TICK_MS = 5_000;

type Env = Record<string, string | undefined>;
type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: JsonObject, key: string): JsonObject {
  const value = raw[key];
  return isObject(value) ? value : {};
}

function asText(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function asInteger(value: unknown): number | undefined {
  if (typeof value === "string" && value.trim().length === 0) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? Math.round(parsed) : undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function clampQuality(value: unknown, fallback: number): number {
  return clamp(asInteger(value) ?? fallback, 1, 100);
}

function asImageFormat(value: unknown): ImageFormat {
  return value === "webp" ? "webp" : "jpeg";
}

function trimSlashes(topic: string): string {
  return topic.replace(/^\/+|\/+$/g, "");
}

/** Library agents listen for requests under the root segment of their topic base. */
export function defaultRequestTopicBase(topicBase: string): string {
  return topicBase.split("/")[0] ?? topicBase;
}

export function normalizeConfig(raw: unknown, env: Env = {}): RuntimeConfig {
  const root = isObject(raw) ? raw : {};
  const mqtt = section(root, "mqtt");
  const images = section(root, "images");
  const homeAssistant = section(root, "homeAssistant");
  const http = section(root, "http");

  const broker = asText(env.MQTT_BROKER) ?? asText(mqtt.broker);
  if (!broker) {
    throw new ConfigError("mqtt.broker is required (or set MQTT_BROKER)");
  }
  const topicText = asText(env.TOPIC_BASE) ?? asText(mqtt.topicBase);
  const topicBase = topicText ? trimSlashes(topicText) : "";
  if (topicBase.length === 0) {
    throw new ConfigError("mqtt.topicBase is required (or set TOPIC_BASE)");
  }
  if (/[#+]/.test(topicBase)) {
    throw new ConfigError(`mqtt.topicBase must not contain wildcards: ${topicBase}`);
  }

  const requestTopicText = asText(mqtt.requestTopicBase);

  return {
    mqtt: {
      broker,
      port: clamp(asInteger(env.MQTT_PORT) ?? asInteger(mqtt.port) ?? DEFAULT_MQTT_PORT, 1, 65535),
      username: asText(env.MQTT_USERNAME) ?? asText(mqtt.username),
      password: asText(env.MQTT_PASSWORD) ?? asText(mqtt.password),
      clientId: asText(mqtt.clientId),
      topicBase,
      requestTopicBase: requestTopicText ? trimSlashes(requestTopicText) : defaultRequestTopicBase(topicBase),
    },
    images: {
      maxImageSize: Math.max(1000, asInteger(images.maxImageSize) ?? DEFAULT_MAX_IMAGE_SIZE),
      minQuality: clampQuality(images.minQuality, DEFAULT_MIN_QUALITY),
      initialQuality: clampQuality(images.initialQuality, DEFAULT_INITIAL_QUALITY),
      format: asImageFormat(images.format),
    },
    homeAssistant: {
      enabled: homeAssistant.enabled !== false,
      discoveryPrefix: trimSlashes(asText(homeAssistant.discoveryPrefix) ?? "homeassistant"),
      bridgeTopicBase: trimSlashes(asText(homeAssistant.bridgeTopicBase) ?? "game-bridge"),
    },
    commandTimeoutMs: Math.max(1000, asInteger(root.commandTimeoutMs) ?? DEFAULT_COMMAND_TIMEOUT_MS),
    expiryTickMs: Math.max(100, asInteger(root.expiryTickMs) ?? DEFAULT_EXPIRY_TICK_MS),
    http: {
      port: clamp(asInteger(env.PORT) ?? asInteger(http.port) ?? 3000, 0, 65535),
      host: asText(http.host) ?? "0.0.0.0",
    },
  };
}

async function readJsonFile(fullPath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(fullPath, "utf8");
  } catch (error) {
    if (isObject(error) && error.code === "ENOENT") return {};
    throw error;
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${fullPath}: ${asErrorMessage(error)}`);
  }
}

export async function loadRuntimeConfig(env: Env = process.env): Promise<RuntimeConfig> {
  const fullPath = resolve(process.cwd(), env.BRIDGE_CONFIG ?? DEFAULT_CONFIG_PATH);
  return normalizeConfig(await readJsonFile(fullPath), env);
}

export function brokerUrl(config: RuntimeConfig["mqtt"]): string {
  if (config.broker.includes("://")) return config.broker;
  return `mqtt://${config.broker}:${config.port}`;
}
