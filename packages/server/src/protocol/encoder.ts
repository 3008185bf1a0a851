import type { TelemetryEvent } from "@ticktape/shared";

import { EncodeError } from "./errors.js";
import {
  FRAME_SCHEMAS,
  MAX_F32,
  MAX_TEXT_BYTES,
  MAX_U32,
  TAG_SIZE,
  headerSize,
  type FrameSchema,
  type NumericField,
} from "./schema.js";

const LONE_SURROGATE = /\p{Surrogate}/u;

const checkNumeric = <E>(field: NumericField<E>, value: number) => {
  if (!Number.isFinite(value)) {
    throw new EncodeError(field.name, `${value} is not a finite number`);
  }
  if (field.kind === "u32") {
    if (!Number.isInteger(value) || value < 0 || value > MAX_U32) {
      throw new EncodeError(field.name, `${value} is not an unsigned 32-bit integer`);
    }
  } else if (Math.abs(value) > MAX_F32) {
    throw new EncodeError(field.name, `${value} is outside the 32-bit float range`);
  }
};

const encodeWith = <E extends TelemetryEvent>(schema: FrameSchema<E>, event: E): Buffer => {
  // Validate and encode everything up front so a bad field never yields a partial frame.
  const texts = schema.text.map((field) => {
    const text = field.read(event);
    if (LONE_SURROGATE.test(text)) {
      throw new EncodeError(field.name, "not valid Unicode text (unpaired surrogate)");
    }
    const bytes = Buffer.from(text, "utf8");
    if (bytes.length > MAX_TEXT_BYTES) {
      throw new EncodeError(field.name, `${bytes.length} bytes exceeds the ${MAX_TEXT_BYTES} byte limit`);
    }
    return bytes;
  });
  const numerics = schema.numeric.map((field) => {
    const value = field.read(event);
    checkNumeric(field, value);
    return value;
  });

  const fixedSize = TAG_SIZE + headerSize(schema);
  const frame = Buffer.allocUnsafe(fixedSize + texts.reduce((total, bytes) => total + bytes.length, 0));

  let offset = frame.writeUInt8(schema.tag, 0);
  for (const bytes of texts) {
    offset = frame.writeUInt16BE(bytes.length, offset);
  }
  schema.numeric.forEach((field, index) => {
    const value = numerics[index] ?? 0;
    offset = field.kind === "u32" ? frame.writeUInt32BE(value, offset) : frame.writeFloatBE(value, offset);
  });
  for (const bytes of texts) {
    offset += bytes.copy(frame, offset);
  }

  return frame;
};

/**
 * Encode one event into a complete frame.
 *
 * @throws EncodeError if a field cannot be represented in the frame layout
 */
export const encodeEvent = (event: TelemetryEvent): Buffer => {
  switch (event.type) {
    case "log":
      return encodeWith(FRAME_SCHEMAS.log, event);
    case "match":
      return encodeWith(FRAME_SCHEMAS.match, event);
    case "price_update":
      return encodeWith(FRAME_SCHEMAS.price_update, event);
    default: {
      const unreachable: never = event;
      throw new EncodeError("type", `unknown event ${JSON.stringify(unreachable)}`);
    }
  }
};

/**
 * Encode several events back to back. All-or-nothing: if any event fails,
 * no bytes are returned.
 */
export const encodeEvents = (events: readonly TelemetryEvent[]): Buffer =>
  Buffer.concat(events.map((event) => encodeEvent(event)));
