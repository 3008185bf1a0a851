export { TelemetryProducer, type ProducerOptions } from "./client.js";
export { parseTelemetryEvent, telemetryEventSchema, type ParsedTelemetryEvent } from "./eventSchema.js";
export { createReplaySource, createSyntheticFeed, type EventSource, type SyntheticFeedOptions } from "./syntheticFeed.js";
