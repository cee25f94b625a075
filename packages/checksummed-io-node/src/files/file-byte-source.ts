/**
 * Node.js file-descriptor byte source
 *
 * Reads with positional `fs.readSync` calls so the cursor lives here rather
 * than in the descriptor.
 */

import { closeSync, fstatSync, openSync, readSync } from "node:fs";
import { type ByteSource, SeekWhence } from "@blockframe/checksummed-io";

export class FileByteSource implements ByteSource {
  private position = 0;
  private fd: number | undefined;

  /**
   * @param fd - Descriptor opened for reading
   * @param ownsDescriptor - Close the descriptor on `close()`
   */
  constructor(
    fd: number,
    private readonly ownsDescriptor = false,
  ) {
    this.fd = fd;
  }

  /** Open `path` read-only; the source owns the descriptor */
  static open(path: string): FileByteSource {
    return new FileByteSource(openSync(path, "r"), true);
  }

  read(buffer: Uint8Array): number {
    const fd = this.descriptor();
    if (buffer.length === 0) return 0;
    const count = readSync(fd, buffer, 0, buffer.length, this.position);
    this.position += count;
    return count;
  }

  seek(offset: number, whence: SeekWhence): number {
    const fd = this.descriptor();
    let base: number;
    switch (whence) {
      case SeekWhence.Start:
        base = 0;
        break;
      case SeekWhence.Current:
        base = this.position;
        break;
      case SeekWhence.End:
        base = fstatSync(fd).size;
        break;
      default:
        throw new Error(`Unknown whence: ${String(whence)}`);
    }
    const target = base + offset;
    if (target < 0) {
      throw new Error(`Seek before start of file: ${target}`);
    }
    this.position = target;
    return target;
  }

  close(): void {
    const fd = this.descriptor();
    this.fd = undefined;
    if (this.ownsDescriptor) closeSync(fd);
  }

  private descriptor(): number {
    if (this.fd === undefined) {
      throw new Error("FileByteSource is closed");
    }
    return this.fd;
  }
}
