import { buildServer } from "./api/server.js";
import { loadRuntimeConfig } from "./config/load-config.js";
import { GameBridge } from "./core/game-bridge.js";
import { createSharpCodec } from "./core/sharp-codec.js";
import { createLogger } from "./logger.js";
import { createMqttSessionFactory } from "./mqtt/mqtt-session.js";
import { availabilityTopicFor } from "./outputs/home-assistant-output.js";

const logger = createLogger();

async function main(): Promise<void> {
  const config = await loadRuntimeConfig();
  const will = config.homeAssistant.enabled
    ? {
        topic: availabilityTopicFor({
          topicBase: config.mqtt.topicBase,
          bridgeTopicBase: config.homeAssistant.bridgeTopicBase,
        }),
        payload: "offline",
      }
    : undefined;

  const bridge = new GameBridge({
    config,
    logger,
    createSession: createMqttSessionFactory(config.mqtt, will),
    codec: createSharpCodec(config.images.format),
  });
  const app = await buildServer(bridge, logger);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutting down");
    await app.close();
    await bridge.stop();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, "Shutdown failed");
        process.exitCode = 1;
      });
    });
  }

  bridge.start();
  logger.info(
    {
      topicBase: config.mqtt.topicBase,
      broker: config.mqtt.broker,
      homeAssistant: config.homeAssistant.enabled,
      images: config.images,
    },
    "Game library bridge started",
  );
  await app.listen({ port: config.http.port, host: config.http.host });
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Startup failed");
  process.exitCode = 1;
});
