import type { TelemetryEvent } from "@ticktape/shared";

import { logger } from "../logger.js";
import { FrameDecoder } from "./decoder.js";
import { ReadAbortedError, TransportError, isTelemetryError } from "./errors.js";

type Chunk = Uint8Array;

export interface ReadEventsOptions {
  /** Aborting unblocks a pending read and fails the stream with ReadAbortedError. */
  signal?: AbortSignal;
  /** Decoder to drive; a fresh one is created when omitted. */
  decoder?: FrameDecoder;
  /** Called with the size of every chunk received from the transport. */
  onChunk?: (byteLength: number) => void;
}

const nextChunk = (
  iterator: AsyncIterator<Chunk>,
  signal: AbortSignal | undefined,
): Promise<IteratorResult<Chunk>> => {
  if (!signal) {
    return iterator.next();
  }
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new ReadAbortedError(signal.reason));
      return;
    }
    const onAbort = () => reject(new ReadAbortedError(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    iterator.next().then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
};

/**
 * Lazily decode events from a byte transport (a socket, a stream, any async
 * iterable of chunks). The sequence ends when the transport ends at a frame
 * boundary and cannot be restarted.
 *
 * @throws ProtocolError on an unknown tag or malformed frame
 * @throws IncompleteFrameError if the transport ends mid-frame
 * @throws ReadAbortedError if `signal` aborts while waiting for bytes
 * @throws TransportError wrapping any failure of the transport itself
 */
export async function* readEvents(
  source: AsyncIterable<Chunk>,
  options: ReadEventsOptions = {},
): AsyncGenerator<TelemetryEvent, void, undefined> {
  const { signal, onChunk } = options;
  const decoder = options.decoder ?? new FrameDecoder();
  const iterator = source[Symbol.asyncIterator]();
  let abandoned = false;

  try {
    for (;;) {
      let result: IteratorResult<Chunk>;
      try {
        result = await nextChunk(iterator, signal);
      } catch (error) {
        if (isTelemetryError(error)) {
          abandoned = error instanceof ReadAbortedError;
          throw error;
        }
        throw new TransportError(error);
      }
      if (result.done) {
        break;
      }

      const chunk = result.value;
      if (!(chunk instanceof Uint8Array)) {
        // A stream with setEncoding() hands over text; the original bytes are already lost.
        throw new TransportError(new TypeError("Transport delivered text instead of bytes"));
      }
      onChunk?.(chunk.length);
      for (const event of decoder.feed(chunk)) {
        yield event;
      }
      if (decoder.failure) {
        throw decoder.failure;
      }
    }
    decoder.end();
  } finally {
    if (iterator.return) {
      const closing = iterator.return();
      if (abandoned) {
        // The aborted read may still be pending on the source; do not wait on it.
        void closing.catch((error: unknown) => {
          logger.debug({ error }, "Transport iterator failed to close after abort");
        });
      } else {
        await closing;
      }
    }
  }
}
