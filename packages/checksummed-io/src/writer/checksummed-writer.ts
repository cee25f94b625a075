/**
 * Checksummed writer
 *
 * Embeds a digest after every `interval` content bytes, and after the final
 * partial block on close. Meant for fresh sinks positioned at offset 0;
 * appending to existing framed content needs outside bookkeeping.
 *
 * Do not forget to `close()` the writer: the digest of a trailing partial
 * block is only emitted there.
 */

import type { Hash32, HashFactory } from "@blockframe/hash";
import { ChecksummedWriteError, ShortWriteError, StreamClosedError } from "../errors/index.js";
import { BlockFraming, encodeDigest } from "../framing/index.js";
import { type ByteSink, type ChecksummedIoLogger, isClosable } from "../io/types.js";

export interface ChecksummedWriterOptions {
  /** Content bytes per block */
  interval: number;
  /** Creates a fresh accumulator for each block */
  newHash: HashFactory;
  logger?: ChecksummedIoLogger;
}

export class ChecksummedWriter {
  private readonly framing: BlockFraming;
  private readonly newHash: HashFactory;
  private readonly logger?: ChecksummedIoLogger;
  private hash: Hash32;
  private pending = 0;
  private isClosed = false;

  constructor(
    private readonly sink: ByteSink,
    options: ChecksummedWriterOptions,
  ) {
    this.framing = new BlockFraming(options.interval);
    this.newHash = options.newHash;
    this.logger = options.logger;
    this.hash = this.newHash();
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Content bytes accumulated in the current, not yet digested block */
  get blockOffset(): number {
    return this.pending;
  }

  /**
   * Write content bytes.
   *
   * @returns `data.length`
   * @throws ChecksummedWriteError when the sink fails; the writer is closed
   */
  write(data: Uint8Array): number {
    this.assertOpen();
    const interval = this.framing.interval;
    let written = 0;
    while (written < data.length) {
      const take = Math.min(interval - this.pending, data.length - written);
      const chunk = data.subarray(written, written + take);
      this.emit(chunk, written, true);
      this.hash.update(chunk);
      written += take;
      this.pending += take;
      if (this.pending === interval) {
        this.emitDigest(written);
        this.hash = this.newHash();
        this.pending = 0;
      }
    }
    return written;
  }

  /**
   * Flush the digest of a pending partial block, close the sink, and
   * close this writer.
   */
  close(): void {
    if (this.isClosed) {
      throw new StreamClosedError("already closed");
    }
    if (this.pending > 0) {
      this.emitDigest(0);
    }
    this.isClosed = true;
    if (isClosable(this.sink)) {
      this.sink.close();
    }
  }

  private emitDigest(bytesWritten: number): void {
    this.emit(encodeDigest(this.hash.getValue()), bytesWritten);
  }

  /**
   * @param bytesWritten - Content bytes confirmed before this call
   * @param isContent - Whether bytes the sink accepts count as content written
   */
  private emit(bytes: Uint8Array, bytesWritten: number, isContent = false): void {
    let accepted: number;
    try {
      accepted = this.sink.write(bytes);
    } catch (error) {
      throw this.poison(bytesWritten, error);
    }
    if (accepted !== bytes.length) {
      const confirmed = isContent ? Math.min(Math.max(accepted, 0), bytes.length) : 0;
      throw this.poison(bytesWritten + confirmed, new ShortWriteError(bytes.length, accepted));
    }
  }

  private poison(bytesWritten: number, cause: unknown): ChecksummedWriteError {
    this.isClosed = true;
    this.logger?.error?.("checksummed writer failed", cause);
    return new ChecksummedWriteError(bytesWritten, cause);
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new StreamClosedError();
    }
  }
}

/**
 * Create a writer that frames content into `sink`.
 *
 * @example
 * ```typescript
 * const writer = createChecksummedWriter(sink, { interval: 65532, newHash: newCrc32 });
 * writer.write(payload);
 * writer.close();
 * ```
 */
export function createChecksummedWriter(
  sink: ByteSink,
  options: ChecksummedWriterOptions,
): ChecksummedWriter {
  return new ChecksummedWriter(sink, options);
}
