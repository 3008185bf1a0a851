import { PassThrough } from "node:stream";

import { describe, expect, it } from "vitest";

import type { TelemetryEvent } from "@ticktape/shared";

import { encodeEvents } from "../encoder.js";
import { IncompleteFrameError, ProtocolError, ReadAbortedError, TransportError } from "../errors.js";
import { readEvents } from "../reader.js";

const events: TelemetryEvent[] = [
  { type: "log", level: "INFO", message: "TCP server started on port 12345" },
  { type: "match", side: "SELL", symbol: "BTC", quantity: 5, price: 67200 },
  { type: "price_update", symbol: "SPY", oldPrice: 528.75, newPrice: 529 },
];

async function* chunksOf(bytes: Buffer, size: number) {
  for (let offset = 0; offset < bytes.length; offset += size) {
    yield bytes.subarray(offset, offset + size);
  }
}

const collect = async (source: AsyncIterable<TelemetryEvent>) => {
  const out: TelemetryEvent[] = [];
  for await (const event of source) {
    out.push(event);
  }
  return out;
};

describe("readEvents", () => {
  it("decodes frames split across arbitrary chunks", async () => {
    const bytes = encodeEvents(events);

    // Every price above is exactly representable as f32.
    await expect(collect(readEvents(chunksOf(bytes, 3)))).resolves.toEqual(events);
    await expect(collect(readEvents(chunksOf(bytes, bytes.length)))).resolves.toEqual(events);
  });

  it("reads from a node stream and reports chunk sizes", async () => {
    const stream = new PassThrough();
    const sizes: number[] = [];
    const bytes = encodeEvents(events);
    stream.write(bytes.subarray(0, 10));
    stream.end(bytes.subarray(10));

    const decoded = await collect(readEvents(stream, { onChunk: (size) => sizes.push(size) }));

    expect(decoded).toEqual(events);
    expect(sizes.reduce((total, size) => total + size, 0)).toBe(bytes.length);
  });

  it("fails with IncompleteFrameError when the transport closes mid-frame", async () => {
    const bytes = encodeEvents(events);
    const received: TelemetryEvent[] = [];

    const reading = (async () => {
      for await (const event of readEvents(chunksOf(bytes.subarray(0, bytes.length - 1), 8))) {
        received.push(event);
      }
    })();

    await expect(reading).rejects.toBeInstanceOf(IncompleteFrameError);
    expect(received).toEqual(events.slice(0, 2));
  });

  it("yields the events before an unknown tag, then fails", async () => {
    const bytes = Buffer.concat([encodeEvents(events.slice(0, 1)), Uint8Array.of(0x09, 0, 1)]);
    const received: TelemetryEvent[] = [];

    const reading = (async () => {
      for await (const event of readEvents(chunksOf(bytes, bytes.length))) {
        received.push(event);
      }
    })();

    await expect(reading).rejects.toBeInstanceOf(ProtocolError);
    expect(received).toEqual(events.slice(0, 1));
  });

  it("aborts a stalled read when the signal fires", async () => {
    const stream = new PassThrough();
    const controller = new AbortController();
    stream.write(encodeEvents(events).subarray(0, 5));

    const reading = collect(readEvents(stream, { signal: controller.signal }));
    setTimeout(() => controller.abort(new Error("deadline")), 20);

    await expect(reading).rejects.toBeInstanceOf(ReadAbortedError);
    await expect(reading).rejects.toThrow("Read aborted: deadline");
  });

  it("wraps transport failures in TransportError", async () => {
    async function* failing(): AsyncGenerator<Uint8Array> {
      yield encodeEvents(events.slice(0, 1));
      throw new Error("ECONNRESET");
    }

    const reading = collect(readEvents(failing()));

    await expect(reading).rejects.toBeInstanceOf(TransportError);
    await expect(reading).rejects.toMatchObject({ code: "TRANSPORT_ERROR", message: "Transport failure: ECONNRESET" });
  });

  it("refuses a transport that decodes bytes to text", async () => {
    const stream = new PassThrough();
    stream.setEncoding("latin1");
    stream.end(encodeEvents([{ type: "match", side: "BUY", symbol: "AAPL", quantity: 100, price: 172.34 }]));

    await expect(collect(readEvents(stream))).rejects.toMatchObject({
      code: "TRANSPORT_ERROR",
      message: "Transport failure: Transport delivered text instead of bytes",
    });
  });
});
