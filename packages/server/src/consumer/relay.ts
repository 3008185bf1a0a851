import type { Server as HttpServer } from "node:http";
import type { AddressInfo } from "node:net";

import type { PriceUpdateEvent, RelayMessage, TelemetryEvent } from "@ticktape/shared";
import { DEFAULT_SYMBOLS } from "@ticktape/shared";
import WebSocket, { WebSocketServer } from "ws";

import { logger } from "../logger.js";
import type { TelemetryError } from "../protocol/errors.js";
import type { ConnectionInfo, EventSink } from "./sinks.js";

export type RelayOptions =
  | { server: HttpServer; path?: string }
  | { port: number; host?: string; path?: string };

/**
 * Hands decoded events to dashboard clients over WebSocket as JSON. New
 * clients get a hello plus the latest price per symbol so they can render
 * without waiting for the next tick.
 */
export class RelaySink implements EventSink {
  private readonly wss: WebSocketServer;
  private readonly latestPrices = new Map<string, { connectionId: string; event: PriceUpdateEvent }>();
  private failure: Error | undefined;

  constructor(options: RelayOptions) {
    const path = options.path ?? "/ws";
    this.wss =
      "server" in options
        ? new WebSocketServer({ server: options.server, path })
        : new WebSocketServer({ port: options.port, host: options.host, path });

    // Bind failures (EADDRINUSE) arrive before anyone awaits ready().
    this.wss.on("error", (error: Error) => {
      this.failure = error;
      logger.error({ error }, "Relay websocket server error");
    });

    this.wss.on("connection", (socket: WebSocket) => {
      logger.info("Relay websocket client connected");
      const symbols = new Set<string>([...DEFAULT_SYMBOLS, ...this.latestPrices.keys()]);
      this.send(socket, {
        type: "relay:hello",
        payload: { symbols: [...symbols] },
        timestamp: Date.now(),
      });
      for (const { connectionId, event } of this.latestPrices.values()) {
        this.send(socket, { type: "telemetry:event", payload: { connectionId, event }, timestamp: Date.now() });
      }
      socket.on("close", () => {
        logger.info("Relay websocket client disconnected");
      });
    });
  }

  get clientCount(): number {
    return this.wss.clients.size;
  }

  /** Resolves once the standalone relay is accepting clients. */
  ready(): Promise<AddressInfo | undefined> {
    return new Promise((resolve, reject) => {
      if (this.failure) {
        reject(this.failure);
        return;
      }
      const current = this.wss.address();
      if (current && typeof current !== "string") {
        resolve(current);
        return;
      }
      // Attached to an HTTP server: listening is the server owner's job.
      if (this.wss.options.port === undefined) {
        resolve(undefined);
        return;
      }
      this.wss.once("listening", () => {
        const address = this.wss.address();
        resolve(address && typeof address !== "string" ? address : undefined);
      });
      this.wss.once("error", reject);
    });
  }

  onEvent(event: TelemetryEvent, connection: ConnectionInfo): void {
    if (event.type === "price_update") {
      this.latestPrices.set(event.symbol, { connectionId: connection.id, event });
    }
    this.broadcast({ type: "telemetry:event", payload: { connectionId: connection.id, event }, timestamp: Date.now() });
  }

  onConnectionError(error: TelemetryError, connection: ConnectionInfo): void {
    this.broadcast({
      type: "telemetry:connection_error",
      payload: { connectionId: connection.id, code: error.code, message: error.message },
      timestamp: Date.now(),
    });
  }

  close(): Promise<void> {
    this.wss.clients.forEach((client) => client.terminate());
    return new Promise((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private broadcast(message: RelayMessage): void {
    const data = JSON.stringify(message);
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
      }
    }
  }

  private send(socket: WebSocket, message: RelayMessage): void {
    socket.send(JSON.stringify(message));
  }
}
