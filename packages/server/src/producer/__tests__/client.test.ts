import { afterEach, describe, expect, it, vi } from "vitest";

import type { TelemetryEvent } from "@ticktape/shared";

import { TelemetryConsumer } from "../../consumer/server.js";
import type { EventSink } from "../../consumer/sinks.js";
import { EncodeError, StreamClosedError, type TelemetryError } from "../../protocol/errors.js";
import { TelemetryProducer } from "../client.js";
import { parseTelemetryEvent } from "../eventSchema.js";
import { createReplaySource, type EventSource } from "../syntheticFeed.js";

const events: TelemetryEvent[] = [
  { type: "price_update", symbol: "ETH/USD", oldPrice: 3212.5, newPrice: 3217 },
  { type: "match", side: "BUY", symbol: "AAPL", quantity: 100, price: 172.25 },
  { type: "log", level: "INFO", message: "Trade executed" },
];

describe("TelemetryProducer", () => {
  let consumer: TelemetryConsumer | undefined;
  let producer: TelemetryProducer | undefined;

  afterEach(async () => {
    await producer?.stop();
    await consumer?.close();
    producer = undefined;
    consumer = undefined;
  });

  const startConsumer = async () => {
    const received: TelemetryEvent[] = [];
    const errors: TelemetryError[] = [];
    const sink: EventSink = {
      onEvent: (event) => received.push(event),
      onConnectionError: (error) => errors.push(error),
    };
    consumer = new TelemetryConsumer({ host: "127.0.0.1", port: 0, sink });
    const { port } = await consumer.listen();
    return { port, received, errors };
  };

  const startProducer = (port: number, source?: EventSource) => {
    producer = new TelemetryProducer({ host: "127.0.0.1", port, source, intervalMs: 10, reconnectMs: 20 });
    producer.start();
    return producer;
  };

  it("streams events from its source to the consumer in order", async () => {
    const { port, received, errors } = await startConsumer();
    startProducer(port, createReplaySource(events, 2));

    await vi.waitFor(() => expect(received).toHaveLength(3));
    expect(received).toEqual(events);
    expect(errors).toEqual([]);
  });

  it("sends events directly once connected", async () => {
    const { port, received } = await startConsumer();
    const client = startProducer(port);
    await client.waitUntilConnected();

    await client.send(events[2]);

    await vi.waitFor(() => expect(received).toEqual([events[2]]));
  });

  it("rejects events that cannot be encoded without breaking the stream", async () => {
    const { port, received, errors } = await startConsumer();
    const client = startProducer(port);
    await client.waitUntilConnected();

    await expect(client.send({ type: "log", level: "INFO", message: "x".repeat(70_000) })).rejects.toBeInstanceOf(
      EncodeError,
    );
    await client.send(events[0]);

    await vi.waitFor(() => expect(received).toEqual([events[0]]));
    expect(errors).toEqual([]);
  });

  it("skips events from the source that fail validation or encoding", async () => {
    const { port, received } = await startConsumer();
    const source = createReplaySource(
      [
        { type: "match", side: "BUY", symbol: "AAPL", quantity: -3, price: 1 },
        { type: "price_update", symbol: "SPY", oldPrice: 1, newPrice: 1e39 },
        events[2],
      ],
      3,
    );
    startProducer(port, source);

    await vi.waitFor(() => expect(received).toEqual([events[2]]));
  });

  it("refuses to send before a connection exists", async () => {
    const client = new TelemetryProducer({ host: "127.0.0.1", port: 1, intervalMs: 10, reconnectMs: 1_000 });

    await expect(client.send(events[0])).rejects.toBeInstanceOf(StreamClosedError);
  });

  it("reconnects after the consumer restarts", async () => {
    const first = await startConsumer();
    const client = startProducer(first.port);
    await client.waitUntilConnected();
    await consumer?.close();

    const received: TelemetryEvent[] = [];
    consumer = new TelemetryConsumer({
      host: "127.0.0.1",
      port: first.port,
      sink: { onEvent: (event) => received.push(event), onConnectionError: () => undefined },
    });
    await consumer.listen();

    await vi.waitFor(() => expect(client.connected).toBe(true), { timeout: 2_000 });
    await vi.waitFor(async () => {
      await client.send(events[1]);
      expect(received).toContainEqual(events[1]);
    });
  });
});

describe("parseTelemetryEvent", () => {
  it("accepts a well-formed event", () => {
    expect(parseTelemetryEvent({ type: "match", side: "SELL", symbol: "BTC", quantity: 5, price: 67200 })).toEqual({
      type: "match",
      side: "SELL",
      symbol: "BTC",
      quantity: 5,
      price: 67200,
    });
  });

  it("accepts empty text, which the wire format allows", () => {
    expect(parseTelemetryEvent({ type: "log", level: "", message: "" })).toEqual({ type: "log", level: "", message: "" });
  });

  it.each([
    { type: "match", side: "HOLD", symbol: "BTC", quantity: 5, price: 1 },
    { type: "match", side: "BUY", symbol: "BTC", quantity: 2.5, price: 1 },
    { type: "price_update", symbol: "SPY", oldPrice: Number.NaN, newPrice: 2 },
    { type: "log", level: "INFO" },
    { type: "heartbeat" },
  ])("rejects %j", (input) => {
    expect(() => parseTelemetryEvent(input)).toThrow();
  });
});
