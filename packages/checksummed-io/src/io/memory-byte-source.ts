import { type ByteSource, SeekWhence } from "./types.js";

/**
 * Seekable source over an in-memory byte array.
 *
 * Seeking past the end is allowed; reads there return 0.
 */
export class MemoryByteSource implements ByteSource {
  private position = 0;
  private isClosed = false;

  constructor(private readonly data: Uint8Array) {}

  read(buffer: Uint8Array): number {
    this.assertOpen();
    if (this.position >= this.data.length) return 0;
    const count = Math.min(buffer.length, this.data.length - this.position);
    buffer.set(this.data.subarray(this.position, this.position + count));
    this.position += count;
    return count;
  }

  seek(offset: number, whence: SeekWhence): number {
    this.assertOpen();
    let base: number;
    switch (whence) {
      case SeekWhence.Start:
        base = 0;
        break;
      case SeekWhence.Current:
        base = this.position;
        break;
      case SeekWhence.End:
        base = this.data.length;
        break;
      default:
        throw new Error(`Unknown whence: ${String(whence)}`);
    }
    const target = base + offset;
    if (target < 0) {
      throw new Error(`Seek before start of source: ${target}`);
    }
    this.position = target;
    return target;
  }

  close(): void {
    this.assertOpen();
    this.isClosed = true;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new Error("MemoryByteSource is closed");
    }
  }
}
