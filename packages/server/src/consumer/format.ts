import type { TelemetryEvent } from "@ticktape/shared";

const money = (value: number) => `$${value.toFixed(2)}`;

/** One-line rendering of an event, as printed by the consumer's log sink. */
export const formatEvent = (event: TelemetryEvent): string => {
  switch (event.type) {
    case "log":
      return `[LOG] ${event.level}: ${event.message}`;
    case "match":
      return `[MATCH] ${event.side} ${event.quantity} ${event.symbol} @ ${money(event.price)}`;
    case "price_update":
      return `[PRICE] ${event.symbol}: ${money(event.oldPrice)} -> ${money(event.newPrice)}`;
  }
};
