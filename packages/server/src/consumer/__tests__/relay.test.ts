import { afterEach, describe, expect, it, vi } from "vitest";
import WebSocket from "ws";

import type { RelayMessage, TelemetryEvent } from "@ticktape/shared";

import { ProtocolError } from "../../protocol/errors.js";
import { RelaySink } from "../relay.js";

const connection = { id: "conn-1", remoteAddress: "127.0.0.1", remotePort: 50_000 };

const openClient = async (port: number) => {
  const messages: RelayMessage[] = [];
  const client = new WebSocket(`ws://127.0.0.1:${port}/ws`);
  client.on("message", (data) => {
    messages.push(JSON.parse(data.toString()));
  });
  await new Promise<void>((resolve, reject) => {
    client.once("open", () => resolve());
    client.once("error", reject);
  });
  return { client, messages };
};

describe("RelaySink", () => {
  let relay: RelaySink | undefined;

  afterEach(async () => {
    await relay?.close();
    relay = undefined;
  });

  const start = async () => {
    relay = new RelaySink({ port: 0, host: "127.0.0.1" });
    const address = await relay.ready();
    if (!address) {
      throw new Error("relay did not bind");
    }
    return { relay, port: address.port };
  };

  it("greets new clients with the known symbols", async () => {
    const { port } = await start();
    const { client, messages } = await openClient(port);

    await vi.waitFor(() => expect(messages).toHaveLength(1));
    expect(messages[0]).toMatchObject({
      type: "relay:hello",
      payload: { symbols: ["BTC/USD", "ETH/USD", "SPY", "AAPL", "TSLA"] },
    });
    client.close();
  });

  it("broadcasts decoded events and connection errors", async () => {
    const { relay: sink, port } = await start();
    const { client, messages } = await openClient(port);
    await vi.waitFor(() => expect(sink.clientCount).toBe(1));
    const event: TelemetryEvent = { type: "match", side: "SELL", symbol: "BTC", quantity: 5, price: 67200 };

    sink.onEvent(event, connection);
    sink.onConnectionError(new ProtocolError("Unknown frame tag 0x09", 9), connection);

    await vi.waitFor(() => expect(messages).toHaveLength(3));
    expect(messages[1]).toMatchObject({ type: "telemetry:event", payload: { connectionId: "conn-1", event } });
    expect(messages[2]).toMatchObject({
      type: "telemetry:connection_error",
      payload: { connectionId: "conn-1", code: "PROTOCOL_ERROR", message: "Unknown frame tag 0x09" },
    });
    client.close();
  });

  it("replays the latest price per symbol to late joiners", async () => {
    const { relay: sink, port } = await start();
    sink.onEvent({ type: "price_update", symbol: "SPY", oldPrice: 528.75, newPrice: 529 }, connection);
    sink.onEvent({ type: "price_update", symbol: "SPY", oldPrice: 529, newPrice: 529.25 }, connection);
    sink.onEvent({ type: "log", level: "INFO", message: "ignored for replay" }, connection);

    const { client, messages } = await openClient(port);

    await vi.waitFor(() => expect(messages).toHaveLength(2));
    expect(messages[1]).toMatchObject({
      type: "telemetry:event",
      payload: { event: { type: "price_update", symbol: "SPY", oldPrice: 529, newPrice: 529.25 } },
    });
    client.close();
  });

  it("reports a port that is already taken through ready()", async () => {
    const { port } = await start();
    const second = new RelaySink({ port, host: "127.0.0.1" });
    await new Promise((resolve) => setTimeout(resolve, 50));

    await expect(second.ready()).rejects.toMatchObject({ code: "EADDRINUSE" });
    await second.close().catch(() => undefined);
  });
});
