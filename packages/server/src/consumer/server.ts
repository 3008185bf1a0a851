import { randomUUID } from "node:crypto";
import { createServer, type AddressInfo, type Server, type Socket } from "node:net";

import type { Logger } from "pino";

import { logger, withConnection } from "../logger.js";
import {
  bytesReceivedCounter,
  connectionFailuresCounter,
  framesDecodedCounter,
  openConnectionsGauge,
} from "../metrics/registry.js";
import { FrameDecoder } from "../protocol/decoder.js";
import { ReadAbortedError, TransportError, isTelemetryError, type TelemetryError } from "../protocol/errors.js";
import { readEvents } from "../protocol/reader.js";
import type { ConnectionInfo, EventSink } from "./sinks.js";

export interface ConsumerServerOptions {
  host: string;
  port: number;
  sink: EventSink;
  /** Abort a connection that delivers no bytes for this long. 0 disables. */
  readTimeoutMs?: number;
  log?: Logger;
}

type ActiveConnection = {
  socket: Socket;
  controller: AbortController;
  done: Promise<void>;
};

/**
 * TCP endpoint that producers stream frames into. Every connection gets its
 * own decoder; a broken connection is reported once and never affects the
 * others.
 */
export class TelemetryConsumer {
  private readonly server: Server;
  private readonly connections = new Map<string, ActiveConnection>();
  private readonly log: Logger;
  private stopping = false;

  constructor(private readonly options: ConsumerServerOptions) {
    this.log = options.log ?? logger;
    this.server = createServer((socket) => this.handleConnection(socket));
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.server.once("error", onError);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off("error", onError);
        const address = this.server.address();
        if (!address || typeof address === "string") {
          reject(new Error("Telemetry consumer is not bound to a TCP address"));
          return;
        }
        this.log.info({ host: address.address, port: address.port }, "Telemetry consumer listening");
        resolve(address);
      });
    });
  }

  async close(): Promise<void> {
    this.stopping = true;
    const closing = new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
    const pending = [...this.connections.values()];
    pending.forEach(({ controller }) => controller.abort(new Error("consumer shutting down")));
    await Promise.allSettled(pending.map(({ done }) => done));
    await closing;
    this.log.info("Telemetry consumer stopped");
  }

  private handleConnection(socket: Socket): void {
    const info: ConnectionInfo = {
      id: randomUUID(),
      remoteAddress: socket.remoteAddress,
      remotePort: socket.remotePort,
    };
    const log = withConnection(info.id);
    const controller = new AbortController();

    socket.on("error", (error) => {
      log.debug({ error }, "Producer socket error");
    });

    const { readTimeoutMs = 0 } = this.options;
    if (readTimeoutMs > 0) {
      socket.setTimeout(readTimeoutMs, () => {
        controller.abort(new Error(`no bytes received for ${readTimeoutMs}ms`));
      });
    }

    openConnectionsGauge.inc();
    this.options.sink.onConnectionOpened?.(info);

    const done = this.consume(socket, info, controller.signal, log).catch((error: unknown) => {
      log.error({ error }, "Event sink failed; connection dropped");
    });
    this.connections.set(info.id, { socket, controller, done });
  }

  private async consume(socket: Socket, info: ConnectionInfo, signal: AbortSignal, log: Logger): Promise<void> {
    const { sink } = this.options;
    const decoder = new FrameDecoder();
    let clean = false;

    try {
      const events = readEvents(socket, {
        signal,
        decoder,
        onChunk: (byteLength) => bytesReceivedCounter.inc(byteLength),
      });
      for await (const event of events) {
        framesDecodedCounter.inc({ type: event.type });
        sink.onEvent(event, info);
      }
      clean = true;
    } catch (error) {
      if (!isTelemetryError(error)) {
        throw error;
      }
      if (error instanceof ReadAbortedError && this.stopping) {
        clean = this.endForShutdown(decoder, info, log);
      } else {
        this.reportFailure(error, info, log);
      }
    } finally {
      socket.destroy();
      this.connections.delete(info.id);
      openConnectionsGauge.dec();
      sink.onConnectionClosed?.(info, { framesDecoded: decoder.framesDecoded, clean });
    }
  }

  /** Shutdown at a frame boundary is a clean close; mid-frame it is an incomplete frame. */
  private endForShutdown(decoder: FrameDecoder, info: ConnectionInfo, log: Logger): boolean {
    try {
      decoder.end();
      return true;
    } catch (error) {
      if (!isTelemetryError(error)) {
        throw error;
      }
      this.reportFailure(error, info, log);
      return false;
    }
  }

  private reportFailure(error: TelemetryError, info: ConnectionInfo, log: Logger): void {
    connectionFailuresCounter.inc({ code: error.code });
    const failure = error instanceof ReadAbortedError || error instanceof TransportError ? "warn" : "error";
    log[failure]({ code: error.code, err: error }, "Telemetry connection terminated");
    this.options.sink.onConnectionError(error, info);
  }
}
