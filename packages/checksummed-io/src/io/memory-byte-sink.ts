import type { ByteSink } from "./types.js";

/**
 * Growable in-memory sink.
 *
 * @example
 * ```typescript
 * const sink = new MemoryByteSink();
 * const writer = createChecksummedWriter(sink, { interval: 16, newHash: newCrc32 });
 * writer.write(data);
 * writer.close();
 * const framed = sink.toBytes();
 * ```
 */
export class MemoryByteSink implements ByteSink {
  private buffer: Uint8Array;
  private size = 0;
  private isClosed = false;

  constructor(initialCapacity = 1024) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 1));
  }

  write(data: Uint8Array): number {
    if (this.isClosed) {
      throw new Error("MemoryByteSink is closed");
    }
    this.ensureCapacity(this.size + data.length);
    this.buffer.set(data, this.size);
    this.size += data.length;
    return data.length;
  }

  close(): void {
    if (this.isClosed) {
      throw new Error("MemoryByteSink is already closed");
    }
    this.isClosed = true;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get length(): number {
    return this.size;
  }

  /** Copy of everything written so far */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.size);
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length;
    while (capacity < required) capacity *= 2;
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.size));
    this.buffer = grown;
  }
}
