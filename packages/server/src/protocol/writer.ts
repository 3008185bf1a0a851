import type { Writable } from "node:stream";

import type { TelemetryEvent } from "@ticktape/shared";

import { encodeEvent } from "./encoder.js";
import { StreamClosedError, TelemetryError, TransportError } from "./errors.js";

/** Write one frame, waiting for `drain` when the stream pushes back. */
export const writeWithBackpressure = (stream: Writable, data: Buffer): Promise<void> =>
  new Promise((resolve, reject) => {
    if (stream.destroyed || stream.writableEnded) {
      reject(new StreamClosedError(stream.destroyed ? "destroyed" : "ended"));
      return;
    }

    let pending = true;
    const listeners: Record<"error" | "close" | "finish" | "drain", (error?: Error) => void> = {
      error: (error) => done(new TransportError(error)),
      close: () => done(new StreamClosedError("close")),
      finish: () => done(new StreamClosedError("finish")),
      drain: () => done(),
    };
    const events = ["error", "close", "finish", "drain"] as const;

    const done = (failure?: TelemetryError) => {
      if (!pending) return;
      pending = false;
      events.forEach((event) => stream.off(event, listeners[event]));
      if (failure) {
        reject(failure);
      } else {
        resolve();
      }
    };

    stream.on("error", listeners.error);
    stream.on("close", listeners.close);
    stream.on("finish", listeners.finish);
    if (stream.write(data)) {
      // A synchronous write error is emitted on the next tick; let it win.
      setImmediate(() => done());
    } else {
      stream.on("drain", listeners.drain);
    }
  });

/**
 * Serializes frame writes on one stream. The first transport failure is
 * sticky; an EncodeError fails only its own write.
 */
export class FrameWriter {
  private chain: Promise<void> = Promise.resolve();
  private failed: TelemetryError | null = null;
  private written = 0;

  /**
   * @param output - The connection to write frames to
   * @param onFrame - Called after each frame was accepted by the stream
   */
  constructor(
    private readonly output: Writable,
    private readonly onFrame?: (event: TelemetryEvent, frameSize: number) => void,
  ) {}

  get framesWritten(): number {
    return this.written;
  }

  get failure(): TelemetryError | null {
    return this.failed;
  }

  write(event: TelemetryEvent): Promise<void> {
    const result = this.chain.then(async () => {
      if (this.failed) {
        throw this.failed;
      }
      // Throws EncodeError before any byte is written.
      const frame = encodeEvent(event);
      try {
        await writeWithBackpressure(this.output, frame);
      } catch (err) {
        this.failed = err instanceof TelemetryError ? err : new TransportError(err);
        throw this.failed;
      }
      this.written += 1;
      this.onFrame?.(event, frame.length);
    });
    // Chain continues regardless to keep writes ordered
    this.chain = result.then(
      () => {},
      () => {},
    );
    return result;
  }

  /** Resolves once every write issued so far has settled. */
  flush(): Promise<void> {
    return this.chain;
  }

  async writeAll(events: readonly TelemetryEvent[]): Promise<void> {
    for (const event of events) {
      await this.write(event);
    }
  }
}
