import { createConnection, type Socket } from "node:net";

import type { TelemetryEvent } from "@ticktape/shared";
import type { Logger } from "pino";

import { logger } from "../logger.js";
import { framesEncodedCounter } from "../metrics/registry.js";
import { EncodeError, StreamClosedError } from "../protocol/errors.js";
import { FrameWriter } from "../protocol/writer.js";
import { telemetryEventSchema } from "./eventSchema.js";
import type { EventSource } from "./syntheticFeed.js";

export type ProducerOptions = {
  host: string;
  port: number;
  /** Polled every `intervalMs`; omit to only send events through `send()`. */
  source?: EventSource;
  intervalMs: number;
  /** Delay before reconnecting after the connection drops. */
  reconnectMs: number;
  log?: Logger;
};

/**
 * Streams events to a consumer over one TCP connection, reconnecting when the
 * connection drops. Frames from a broken connection are not resent.
 */
export class TelemetryProducer {
  private socket: Socket | undefined;
  private writer: FrameWriter | undefined;
  private stopped = true;
  private running = false;
  private ticker: NodeJS.Timeout | undefined;
  private reconnectTimer: NodeJS.Timeout | undefined;
  private readonly log: Logger;
  private readonly connectWaiters: Array<() => void> = [];

  constructor(private readonly options: ProducerOptions) {
    this.log = options.log ?? logger;
  }

  get connected(): boolean {
    return this.writer !== undefined;
  }

  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.connect();
    if (this.options.source) {
      this.ticker = setInterval(() => {
        void this.tick();
      }, this.options.intervalMs);
    }
    this.log.info({ host: this.options.host, port: this.options.port }, "Telemetry producer started");
  }

  /** Resolves once a connection is established. */
  waitUntilConnected(): Promise<void> {
    if (this.connected) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.connectWaiters.push(resolve));
  }

  /**
   * Encode and write one event on the current connection.
   *
   * @throws EncodeError if the event does not fit the frame layout
   * @throws StreamClosedError if there is no open connection
   * @throws TransportError if the connection fails while writing
   */
  async send(event: TelemetryEvent): Promise<void> {
    const { writer } = this;
    if (!writer) {
      throw new StreamClosedError("close");
    }
    await writer.write(event);
  }

  /** Stop ticking, flush pending writes and close the connection. */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    clearInterval(this.ticker);
    clearTimeout(this.reconnectTimer);
    await this.writer?.flush();
    const { socket } = this;
    if (socket && !socket.destroyed) {
      await new Promise<void>((resolve) => {
        socket.once("close", () => resolve());
        socket.end();
      });
    }
    this.log.info("Telemetry producer stopped");
  }

  private connect(): void {
    if (this.stopped) {
      return;
    }
    const socket = createConnection({ host: this.options.host, port: this.options.port });
    socket.setNoDelay(true);
    // The consumer never writes back; drain the read side so its FIN closes us.
    socket.resume();
    this.socket = socket;

    socket.once("connect", () => {
      this.writer = new FrameWriter(socket, (event) => framesEncodedCounter.inc({ type: event.type }));
      this.log.info({ host: this.options.host, port: this.options.port }, "Connected to telemetry consumer");
      this.connectWaiters.splice(0).forEach((resolve) => resolve());
    });
    socket.on("error", (error) => {
      this.log.warn({ error: error.message }, "Telemetry connection error");
    });
    socket.once("close", () => {
      if (this.socket === socket) {
        this.socket = undefined;
        this.writer = undefined;
      }
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    if (this.stopped) {
      return;
    }
    clearTimeout(this.reconnectTimer);
    this.reconnectTimer = setTimeout(() => this.connect(), this.options.reconnectMs);
  }

  private async tick(): Promise<void> {
    const { source } = this.options;
    if (this.stopped || this.running || !source || !this.writer) {
      return;
    }
    this.running = true;
    try {
      for (const candidate of source.next()) {
        const parsed = telemetryEventSchema.safeParse(candidate);
        if (!parsed.success) {
          this.log.warn({ issues: parsed.error.issues }, "Dropping malformed event");
          continue;
        }
        try {
          await this.send(parsed.data);
        } catch (error) {
          if (error instanceof EncodeError) {
            this.log.warn({ field: error.field, reason: error.reason }, "Dropping event that cannot be encoded");
            continue;
          }
          throw error;
        }
      }
    } catch (error) {
      this.log.warn({ error }, "Telemetry tick failed; waiting for reconnect");
      this.socket?.destroy();
    } finally {
      this.running = false;
    }
  }
}
