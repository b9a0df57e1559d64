import { pino } from "pino";
import type { Logger } from "pino";

export type { Logger };

export function createLogger(env: Record<string, string | undefined> = process.env): Logger {
  const level = env.BRIDGE_DEBUG === "1" ? "debug" : env.LOG_LEVEL ?? "info";
  return pino({ level, base: { service: "game-library-bridge" } });
}
