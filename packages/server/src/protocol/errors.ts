import type { DecoderPhase } from "./decoder.js";

export type TelemetryErrorCode =
  | "ENCODE_ERROR"
  | "PROTOCOL_ERROR"
  | "INCOMPLETE_FRAME"
  | "TRANSPORT_ERROR"
  | "READ_ABORTED"
  | "STREAM_CLOSED";

/**
 * Base class for every failure the telemetry stream can report. The `code`
 * is stable and safe to put on the wire to dashboards or into metric labels.
 */
export abstract class TelemetryError extends Error {
  abstract readonly code: TelemetryErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The caller handed the encoder a value the frame layout cannot carry.
 * Nothing was written; the event must not be sent.
 */
export class EncodeError extends TelemetryError {
  readonly code = "ENCODE_ERROR";

  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Cannot encode field "${field}": ${reason}`);
  }
}

/**
 * The byte stream does not follow the frame layout. Fatal for the connection:
 * frames carry no delimiter, so there is nothing to resynchronize on.
 */
export class ProtocolError extends TelemetryError {
  readonly code = "PROTOCOL_ERROR";

  constructor(
    message: string,
    public readonly tag?: number,
  ) {
    super(message);
  }
}

export class IncompleteFrameError extends TelemetryError {
  readonly code = "INCOMPLETE_FRAME";

  constructor(
    public readonly phase: DecoderPhase,
    public readonly bytesNeeded: number,
    public readonly bytesAvailable: number,
  ) {
    super(`Stream ended mid-frame while ${phase} (needed ${bytesNeeded} bytes, had ${bytesAvailable})`);
  }
}

export class TransportError extends TelemetryError {
  readonly code = "TRANSPORT_ERROR";

  constructor(cause: unknown) {
    super(`Transport failure: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

/**
 * A read was abandoned because its deadline passed or its owner cancelled it.
 * The decoder that was reading must be discarded.
 */
export class ReadAbortedError extends TelemetryError {
  readonly code = "READ_ABORTED";

  constructor(reason?: unknown) {
    super(`Read aborted${reason instanceof Error ? `: ${reason.message}` : ""}`, { cause: reason });
  }
}

export class StreamClosedError extends TelemetryError {
  readonly code = "STREAM_CLOSED";

  constructor(public readonly reason: "destroyed" | "ended" | "close" | "finish") {
    super(`Output stream unavailable: ${reason}`);
  }
}

export const isTelemetryError = (error: unknown): error is TelemetryError => error instanceof TelemetryError;
