import type { TelemetryEvent, TradeSide } from "@ticktape/shared";
import { DEFAULT_SYMBOLS } from "@ticktape/shared";

/** Anything that can hand the producer the next batch of events. */
export interface EventSource {
  next(): TelemetryEvent[];
}

type SymbolSettings = {
  basePrice: number;
  minQuantity: number;
  maxQuantity: number;
  volatilityBps: number;
};

const DEFAULT_SETTINGS: SymbolSettings = {
  basePrice: 100,
  minQuantity: 1,
  maxQuantity: 100,
  volatilityBps: 20,
};

const SYMBOL_SETTINGS: Record<string, SymbolSettings> = {
  "BTC/USD": { basePrice: 67_200, minQuantity: 1, maxQuantity: 5, volatilityBps: 25 },
  "ETH/USD": { basePrice: 3_212, minQuantity: 1, maxQuantity: 25, volatilityBps: 30 },
  SPY: { basePrice: 528, minQuantity: 10, maxQuantity: 500, volatilityBps: 8 },
  AAPL: { basePrice: 172, minQuantity: 10, maxQuantity: 300, volatilityBps: 12 },
  TSLA: { basePrice: 188, minQuantity: 5, maxQuantity: 200, volatilityBps: 40 },
};

// Roughly: half the traffic is price ticks, a third matches, the rest log lines.
const PRICE_UPDATE_WEIGHT = 0.5;
const MATCH_WEIGHT = 0.35;

export type Random = () => number;

const pick = <T>(items: readonly T[], random: Random): T | undefined => items[Math.floor(random() * items.length)];

const randomInt = (min: number, max: number, random: Random) => Math.floor(random() * (max - min + 1)) + min;

const jitterPrice = (price: number, bps: number, random: Random) =>
  price * (1 + ((random() - 0.5) * bps) / 10_000);

const roundCents = (value: number) => Math.round(value * 100) / 100;

export type SyntheticFeedOptions = {
  symbols?: readonly string[];
  maxBurst?: number;
  random?: Random;
};

/**
 * Random-walk feed of price updates, matches and system log lines.
 * Prices drift per symbol from their base price; matches trade near the last
 * price. Used to drive the producer when no live source is attached.
 */
export const createSyntheticFeed = ({
  symbols = DEFAULT_SYMBOLS,
  maxBurst = 5,
  random = Math.random,
}: SyntheticFeedOptions = {}): EventSource => {
  const lastPrices = new Map<string, number>();
  let orderId = 14_000;

  const settingsFor = (symbol: string) => SYMBOL_SETTINGS[symbol] ?? DEFAULT_SETTINGS;

  const currentPrice = (symbol: string) => lastPrices.get(symbol) ?? settingsFor(symbol).basePrice;

  const priceUpdate = (symbol: string): TelemetryEvent => {
    const oldPrice = currentPrice(symbol);
    const newPrice = Math.max(roundCents(jitterPrice(oldPrice, settingsFor(symbol).volatilityBps, random)), 0.01);
    lastPrices.set(symbol, newPrice);
    return { type: "price_update", symbol, oldPrice, newPrice };
  };

  const match = (symbol: string): TelemetryEvent => {
    const settings = settingsFor(symbol);
    const side: TradeSide = random() > 0.5 ? "SELL" : "BUY";
    return {
      type: "match",
      side,
      quantity: randomInt(settings.minQuantity, settings.maxQuantity, random),
      symbol,
      price: roundCents(jitterPrice(currentPrice(symbol), settings.volatilityBps / 2, random)),
    };
  };

  const logLine = (symbol: string): TelemetryEvent => {
    orderId += 1;
    const roll = random();
    if (roll < 0.6) {
      return { type: "log", level: "INFO", message: `Trade executed: Order#${orderId} matched on ${symbol}` };
    }
    if (roll < 0.9) {
      return { type: "log", level: "DEBUG", message: `Received order: ID#${orderId} for ${symbol}` };
    }
    return { type: "log", level: "WARN", message: `Order#${orderId} on ${symbol} rejected: price outside band` };
  };

  return {
    next: () => {
      const events: TelemetryEvent[] = [];
      const count = randomInt(1, Math.max(maxBurst, 1), random);
      for (let i = 0; i < count; i += 1) {
        const symbol = pick(symbols, random);
        if (!symbol) {
          break;
        }
        const roll = random();
        if (roll < PRICE_UPDATE_WEIGHT) {
          events.push(priceUpdate(symbol));
        } else if (roll < PRICE_UPDATE_WEIGHT + MATCH_WEIGHT) {
          events.push(match(symbol));
        } else {
          events.push(logLine(symbol));
        }
      }
      return events;
    },
  };
};

/** Replays a fixed list of events in order, then nothing. */
export const createReplaySource = (events: readonly TelemetryEvent[], batchSize = 1): EventSource => {
  let cursor = 0;
  return {
    next: () => {
      const batch = events.slice(cursor, cursor + batchSize);
      cursor += batch.length;
      return batch;
    },
  };
};
