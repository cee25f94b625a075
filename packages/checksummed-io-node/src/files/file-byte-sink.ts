/**
 * Node.js file-descriptor byte sink
 */

import { closeSync, openSync, writeSync } from "node:fs";
import type { ByteSink } from "@blockframe/checksummed-io";

export class FileByteSink implements ByteSink {
  private fd: number | undefined;

  /**
   * @param fd - Descriptor opened for writing, positioned where content starts
   * @param ownsDescriptor - Close the descriptor on `close()`
   */
  constructor(
    fd: number,
    private readonly ownsDescriptor = false,
  ) {
    this.fd = fd;
  }

  /** Create (or truncate) `path`; the sink owns the descriptor */
  static create(path: string): FileByteSink {
    return new FileByteSink(openSync(path, "w"), true);
  }

  write(data: Uint8Array): number {
    return writeSync(this.descriptor(), data);
  }

  close(): void {
    const fd = this.descriptor();
    this.fd = undefined;
    if (this.ownsDescriptor) closeSync(fd);
  }

  private descriptor(): number {
    if (this.fd === undefined) {
      throw new Error("FileByteSink is closed");
    }
    return this.fd;
  }
}
