/**
 * Buffers bytes from arbitrary-sized reads and hands them out only in whole
 * units: `take(n)` yields exactly `n` bytes or nothing at all.
 */
export class ByteAccumulator {
  private chunks: Buffer[] = [];
  private size = 0;

  get available(): number {
    return this.size;
  }

  append(chunk: Uint8Array): void {
    if (chunk.length === 0) {
      return;
    }
    // Copied: transports may reuse the chunk's memory after the read returns.
    this.chunks.push(Buffer.from(chunk));
    this.size += chunk.length;
  }

  take(count: number): Buffer | undefined {
    if (count > this.size) {
      return undefined;
    }
    if (count === 0) {
      return Buffer.alloc(0);
    }

    // Collapse lazily; most reads land inside the first chunk.
    const head = this.chunks[0];
    if (!head || head.length < count) {
      this.chunks = [Buffer.concat(this.chunks, this.size)];
    }
    const first = this.chunks[0];
    if (!first) {
      return undefined;
    }

    const unit = first.subarray(0, count);
    if (first.length === count) {
      this.chunks.shift();
    } else {
      this.chunks[0] = first.subarray(count);
    }
    this.size -= count;
    return unit;
  }

  clear(): void {
    this.chunks = [];
    this.size = 0;
  }
}
