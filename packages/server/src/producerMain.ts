import { config } from "./config.js";
import { logger } from "./logger.js";
import { TelemetryProducer, createSyntheticFeed } from "./producer/index.js";

const bootstrap = async () => {
  logger.info(
    { service: config.serviceName, host: config.telemetryHost, port: config.telemetryPort },
    "Starting synthetic telemetry producer",
  );

  const producer = new TelemetryProducer({
    host: config.telemetryHost,
    port: config.telemetryPort,
    source: createSyntheticFeed({ maxBurst: config.producerMaxBurst }),
    intervalMs: config.producerIntervalMs,
    reconnectMs: config.producerReconnectMs,
  });
  producer.start();

  const shutdown = async () => {
    logger.info("Shutting down telemetry producer");
    await Promise.allSettled([producer.stop()]);
    process.exit(0);
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

void bootstrap().catch((error) => {
  logger.error({ error }, "Telemetry producer failed to start");
  process.exit(1);
});
