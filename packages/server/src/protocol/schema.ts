import {
  EVENT_TAGS,
  isTradeSide,
  type EventTag,
  type LogEvent,
  type MatchEvent,
  type PriceUpdateEvent,
  type TelemetryEvent,
  type TelemetryEventType,
} from "@ticktape/shared";

import { ProtocolError } from "./errors.js";

/**
 * Frame layout, shared by the encoder and the decoder:
 *
 *   tag:u8 | len(text[0]):u16 ... len(text[n]):u16 | numeric[0] ... numeric[m] | text[0] ... text[n]
 *
 * Every fixed-width field comes before any text, so the decoder can read one
 * header of known size per tag before it needs a single text length.
 * All integers and floats are big-endian.
 */

export const TAG_SIZE = 1;
export const TEXT_LENGTH_SIZE = 2;
export const MAX_TEXT_BYTES = 0xffff;
export const MAX_U32 = 0xffff_ffff;
/** Largest finite IEEE-754 single-precision value. */
export const MAX_F32 = 3.4028234663852886e38;

export type NumericKind = "u32" | "f32";

export const NUMERIC_SIZES: Record<NumericKind, number> = {
  u32: 4,
  f32: 4,
};

export interface TextField<E> {
  readonly name: string;
  read(event: E): string;
}

export interface NumericField<E> {
  readonly name: string;
  readonly kind: NumericKind;
  read(event: E): number;
}

export interface FrameSchema<E extends TelemetryEvent = TelemetryEvent> {
  readonly tag: EventTag;
  readonly type: E["type"];
  /** Text fields in wire order. */
  readonly text: readonly TextField<E>[];
  /** Fixed-width numeric fields in wire order, after the text lengths. */
  readonly numeric: readonly NumericField<E>[];
  /** Throws ProtocolError when decoded values are not a valid event. */
  build(text: readonly string[], numeric: readonly number[]): E;
}

const logSchema: FrameSchema<LogEvent> = {
  tag: EVENT_TAGS.log,
  type: "log",
  text: [
    { name: "level", read: (event) => event.level },
    { name: "message", read: (event) => event.message },
  ],
  numeric: [],
  build: ([level = "", message = ""]) => ({ type: "log", level, message }),
};

const matchSchema: FrameSchema<MatchEvent> = {
  tag: EVENT_TAGS.match,
  type: "match",
  text: [
    { name: "side", read: (event) => event.side },
    { name: "symbol", read: (event) => event.symbol },
  ],
  numeric: [
    { name: "quantity", kind: "u32", read: (event) => event.quantity },
    { name: "price", kind: "f32", read: (event) => event.price },
  ],
  build: ([side = "", symbol = ""], [quantity = 0, price = 0]) => {
    if (!isTradeSide(side)) {
      throw new ProtocolError(`Invalid match side "${side}"`, EVENT_TAGS.match);
    }
    return { type: "match", side, quantity, symbol, price };
  },
};

const priceUpdateSchema: FrameSchema<PriceUpdateEvent> = {
  tag: EVENT_TAGS.price_update,
  type: "price_update",
  text: [{ name: "symbol", read: (event) => event.symbol }],
  numeric: [
    { name: "oldPrice", kind: "f32", read: (event) => event.oldPrice },
    { name: "newPrice", kind: "f32", read: (event) => event.newPrice },
  ],
  build: ([symbol = ""], [oldPrice = 0, newPrice = 0]) => ({
    type: "price_update",
    symbol,
    oldPrice,
    newPrice,
  }),
};

export const FRAME_SCHEMAS: { readonly [K in TelemetryEventType]: FrameSchema<Extract<TelemetryEvent, { type: K }>> } = {
  log: logSchema,
  match: matchSchema,
  price_update: priceUpdateSchema,
};

const schemasByTag = new Map<number, FrameSchema>(
  Object.values(FRAME_SCHEMAS).map((schema): [number, FrameSchema] => [schema.tag, schema]),
);

export const isEventTag = (value: number): value is EventTag => schemasByTag.has(value);

export const schemaForTag = (tag: number): FrameSchema | undefined => schemasByTag.get(tag);

/** Size of the fixed-width block that follows the tag byte. */
export const headerSize = (schema: FrameSchema): number =>
  schema.text.length * TEXT_LENGTH_SIZE +
  schema.numeric.reduce((total, field) => total + NUMERIC_SIZES[field.kind], 0);
