export const TRADE_SIDES = ["BUY", "SELL"] as const;
export type TradeSide = (typeof TRADE_SIDES)[number];

export interface LogEvent {
  readonly type: "log";
  readonly level: string;
  readonly message: string;
}

export interface MatchEvent {
  readonly type: "match";
  readonly side: TradeSide;
  readonly quantity: number; // u32 on the wire
  readonly symbol: string;
  readonly price: number; // f32 on the wire
}

export interface PriceUpdateEvent {
  readonly type: "price_update";
  readonly symbol: string;
  readonly oldPrice: number;
  readonly newPrice: number;
}

export type TelemetryEvent = LogEvent | MatchEvent | PriceUpdateEvent;

export type TelemetryEventType = TelemetryEvent["type"];

export type TelemetryEventOf<TType extends TelemetryEventType> = Extract<TelemetryEvent, { type: TType }>;

/**
 * Wire tag per event variant. The tag is the first byte of every frame and
 * alone decides the layout of the bytes that follow it.
 */
export const EVENT_TAGS = {
  log: 1,
  match: 2,
  price_update: 3,
} as const satisfies Record<TelemetryEventType, number>;

export type EventTag = (typeof EVENT_TAGS)[TelemetryEventType];

export const isTradeSide = (value: string): value is TradeSide =>
  TRADE_SIDES.some((side) => side === value);

/**
 * Envelope pushed to dashboard clients by the relay. Decoded events travel as
 * JSON from here on; the binary framing stops at the consumer.
 */
export interface RelayEnvelope<TType extends string, TPayload> {
  type: TType;
  payload: TPayload;
  timestamp: number;
}

export type RelayMessage =
  | RelayEnvelope<"relay:hello", { symbols: string[] }>
  | RelayEnvelope<"telemetry:event", { connectionId: string; event: TelemetryEvent }>
  | RelayEnvelope<"telemetry:connection_error", { connectionId: string; code: string; message: string }>;

export const DEFAULT_SYMBOLS = ["BTC/USD", "ETH/USD", "SPY", "AAPL", "TSLA"] as const;
export type TelemetrySymbol = (typeof DEFAULT_SYMBOLS)[number];
