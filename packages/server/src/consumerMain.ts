import { createServer } from "node:http";

import { createApp } from "./app.js";
import { config } from "./config.js";
import { LogSink, RelaySink, TelemetryConsumer, fanOut, type EventSink } from "./consumer/index.js";
import { logger } from "./logger.js";

const bootstrap = async () => {
  logger.info(
    { service: config.serviceName, host: config.telemetryHost, port: config.telemetryPort },
    "Starting telemetry consumer",
  );

  const relay = config.relayEnabled ? new RelaySink({ port: config.gatewayPort }) : undefined;
  const sinks: EventSink[] = [new LogSink()];
  if (relay) {
    sinks.push(relay);
  }

  const consumer = new TelemetryConsumer({
    host: config.telemetryHost,
    port: config.telemetryPort,
    sink: fanOut(...sinks),
    readTimeoutMs: config.readTimeoutMs,
  });

  const httpServer = createServer(createApp(consumer));

  await consumer.listen();
  if (relay) {
    await relay.ready();
    logger.info({ port: config.gatewayPort }, "Relay websocket server listening");
  }
  httpServer.listen(config.httpPort, () => {
    logger.info({ port: config.httpPort }, "Health and metrics server listening");
  });

  const shutdown = async () => {
    logger.info("Shutting down telemetry consumer");
    httpServer.close();
    await Promise.allSettled([consumer.close(), relay?.close()]);
    process.exit(0);
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

void bootstrap().catch((error) => {
  logger.error({ error }, "Telemetry consumer failed to start");
  process.exit(1);
});
