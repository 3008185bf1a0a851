export { formatEvent } from "./format.js";
export { RelaySink, type RelayOptions } from "./relay.js";
export { TelemetryConsumer, type ConsumerServerOptions } from "./server.js";
export { LogSink, fanOut, type ConnectionInfo, type ConnectionSummary, type EventSink } from "./sinks.js";
