import type { TelemetryEvent } from "@ticktape/shared";

import { ByteAccumulator } from "./byteAccumulator.js";
import { IncompleteFrameError, ProtocolError, TelemetryError } from "./errors.js";
import { NUMERIC_SIZES, TAG_SIZE, TEXT_LENGTH_SIZE, headerSize, schemaForTag, type FrameSchema } from "./schema.js";

export type DecoderPhase = "awaiting_tag" | "awaiting_header" | "awaiting_payload" | "failed" | "closed";

type DecoderState =
  | { phase: "awaiting_tag" }
  | { phase: "awaiting_header"; schema: FrameSchema; size: number }
  | {
      phase: "awaiting_payload";
      schema: FrameSchema;
      lengths: number[];
      numeric: number[];
      size: number;
    }
  | { phase: "failed"; error: TelemetryError }
  | { phase: "closed" };

const utf8 = new TextDecoder("utf-8", { fatal: true });

const decodeText = (schema: FrameSchema, fieldIndex: number, bytes: Uint8Array): string => {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    const name = schema.text[fieldIndex]?.name ?? `#${fieldIndex}`;
    throw new ProtocolError(
      `Field "${name}" of ${schema.type} frame is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`,
      schema.tag,
    );
  }
};

const toHex = (value: number) => `0x${value.toString(16).padStart(2, "0")}`;

/**
 * Incremental frame decoder for one connection.
 *
 * Bytes go in through `feed` in whatever chunks the transport produced; whole
 * events come out. Each phase waits until it holds its complete unit (tag,
 * header, payload) before interpreting a single byte of it.
 *
 * The decoder is single-use. A protocol error moves it to `failed` for good,
 * `end()` moves it to `closed`; either way a new connection needs a new
 * decoder.
 */
export class FrameDecoder {
  private readonly buffer = new ByteAccumulator();
  private state: DecoderState = { phase: "awaiting_tag" };
  private decoded = 0;

  get phase(): DecoderPhase {
    return this.state.phase;
  }

  /** The error that failed this decoder, if any. */
  get failure(): TelemetryError | undefined {
    return this.state.phase === "failed" ? this.state.error : undefined;
  }

  get framesDecoded(): number {
    return this.decoded;
  }

  get bufferedBytes(): number {
    return this.buffer.available;
  }

  /**
   * Append a chunk and return every event it completes, in stream order.
   *
   * If the chunk completes some frames and then hits a protocol error, the
   * completed events are returned and the decoder is left `failed`; check
   * `failure` after each call. When nothing was completed the error is thrown
   * straight away.
   */
  feed(chunk: Uint8Array): TelemetryEvent[] {
    this.assertOpen();
    this.buffer.append(chunk);

    const events: TelemetryEvent[] = [];
    try {
      let event = this.next();
      while (event) {
        events.push(event);
        event = this.next();
      }
    } catch (error) {
      const failure = error instanceof TelemetryError ? error : new ProtocolError(String(error));
      this.state = { phase: "failed", error: failure };
      this.buffer.clear();
      if (events.length === 0) {
        throw failure;
      }
    }
    return events;
  }

  /**
   * Signal end-of-stream. Clean only at a frame boundary.
   *
   * @throws IncompleteFrameError if the stream stopped inside a frame
   */
  end(): void {
    this.assertOpen();
    const { state } = this;
    const available = this.buffer.available;
    this.buffer.clear();

    // feed() always consumes a buffered tag byte, so nothing is pending here.
    if (state.phase === "awaiting_tag") {
      this.state = { phase: "closed" };
      return;
    }

    const needed = state.phase === "awaiting_header" || state.phase === "awaiting_payload" ? state.size : 0;
    const error = new IncompleteFrameError(state.phase, needed, available);
    this.state = { phase: "failed", error };
    throw error;
  }

  private assertOpen(): void {
    if (this.state.phase === "failed") {
      throw this.state.error;
    }
    if (this.state.phase === "closed") {
      throw new ProtocolError("Decoder is closed; a new connection needs a new decoder");
    }
  }

  /** Advance the state machine as far as buffered bytes allow; returns an event when a frame completes. */
  private next(): TelemetryEvent | undefined {
    for (;;) {
      const state = this.state;
      switch (state.phase) {
        case "awaiting_tag": {
          const unit = this.buffer.take(TAG_SIZE);
          if (!unit) {
            return undefined;
          }
          const tag = unit.readUInt8(0);
          const schema = schemaForTag(tag);
          if (!schema) {
            throw new ProtocolError(`Unknown frame tag ${toHex(tag)}`, tag);
          }
          this.state = { phase: "awaiting_header", schema, size: headerSize(schema) };
          break;
        }
        case "awaiting_header": {
          const header = this.buffer.take(state.size);
          if (!header) {
            return undefined;
          }
          const { schema } = state;
          const lengths = schema.text.map((_, index) => header.readUInt16BE(index * TEXT_LENGTH_SIZE));
          let offset = lengths.length * TEXT_LENGTH_SIZE;
          const numeric = schema.numeric.map((field) => {
            const value = field.kind === "u32" ? header.readUInt32BE(offset) : header.readFloatBE(offset);
            offset += NUMERIC_SIZES[field.kind];
            return value;
          });
          this.state = {
            phase: "awaiting_payload",
            schema,
            lengths,
            numeric,
            size: lengths.reduce((total, length) => total + length, 0),
          };
          break;
        }
        case "awaiting_payload": {
          const payload = this.buffer.take(state.size);
          if (!payload) {
            return undefined;
          }
          const { schema, lengths, numeric } = state;
          let offset = 0;
          const text = lengths.map((length, index) => {
            const value = decodeText(schema, index, payload.subarray(offset, offset + length));
            offset += length;
            return value;
          });
          const event = Object.freeze(schema.build(text, numeric));
          this.state = { phase: "awaiting_tag" };
          this.decoded += 1;
          return event;
        }
        case "failed":
        case "closed":
          return undefined;
      }
    }
  }
}

/** Decode a byte sequence that must contain whole frames only. */
export const decodeFrames = (bytes: Uint8Array): TelemetryEvent[] => {
  const decoder = new FrameDecoder();
  const events = decoder.feed(bytes);
  if (decoder.failure) {
    throw decoder.failure;
  }
  decoder.end();
  return events;
};
