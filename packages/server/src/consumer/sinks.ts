import type { TelemetryEvent } from "@ticktape/shared";
import type { Logger } from "pino";

import { logger } from "../logger.js";
import type { TelemetryError } from "../protocol/errors.js";
import { formatEvent } from "./format.js";

export interface ConnectionInfo {
  id: string;
  remoteAddress?: string;
  remotePort?: number;
}

export interface ConnectionSummary {
  framesDecoded: number;
  /** True when the peer closed at a frame boundary. */
  clean: boolean;
}

/**
 * Receives decoded events from the consumer. Each connection reports at most
 * one terminal error, always before it reports being closed.
 */
export interface EventSink {
  onConnectionOpened?(connection: ConnectionInfo): void;
  onEvent(event: TelemetryEvent, connection: ConnectionInfo): void;
  onConnectionError(error: TelemetryError, connection: ConnectionInfo): void;
  onConnectionClosed?(connection: ConnectionInfo, summary: ConnectionSummary): void;
}

const describePeer = (connection: ConnectionInfo) =>
  connection.remoteAddress ? `${connection.remoteAddress}:${connection.remotePort ?? "?"}` : connection.id;

export class LogSink implements EventSink {
  constructor(private readonly log: Logger = logger) {}

  onConnectionOpened(connection: ConnectionInfo): void {
    this.log.info({ connectionId: connection.id }, `[STATUS] Connected by ${describePeer(connection)}`);
  }

  onEvent(event: TelemetryEvent, connection: ConnectionInfo): void {
    this.log.info({ connectionId: connection.id, type: event.type }, formatEvent(event));
  }

  onConnectionError(error: TelemetryError, connection: ConnectionInfo): void {
    this.log.error({ connectionId: connection.id, code: error.code }, `[ERROR] ${error.message}`);
  }

  onConnectionClosed(connection: ConnectionInfo, summary: ConnectionSummary): void {
    this.log.info(
      { connectionId: connection.id, framesDecoded: summary.framesDecoded, clean: summary.clean },
      `[STATUS] Connection from ${describePeer(connection)} closed`,
    );
  }
}

/** Deliver every callback to each sink in order. */
export const fanOut = (...sinks: EventSink[]): EventSink => ({
  onConnectionOpened: (connection) => sinks.forEach((sink) => sink.onConnectionOpened?.(connection)),
  onEvent: (event, connection) => sinks.forEach((sink) => sink.onEvent(event, connection)),
  onConnectionError: (error, connection) => sinks.forEach((sink) => sink.onConnectionError(error, connection)),
  onConnectionClosed: (connection, summary) =>
    sinks.forEach((sink) => sink.onConnectionClosed?.(connection, summary)),
});
