/**
 * Checksummed reader
 *
 * Reads content produced by `ChecksummedWriter`. Digests are skipped
 * transparently by `read()`, offsets passed to and returned by `seek()` are
 * logical (content-only), and `verify()` checks the block under the cursor.
 *
 * After any error thrown by `read()` or `verify()` the cursor position is
 * unspecified: seek before reading again.
 */

import { bytesToHex, type HashFactory } from "@blockframe/hash";
import { InvalidArgumentError, InvalidWhenceError, StreamClosedError } from "../errors/index.js";
import { BlockFraming, DIGEST_SIZE, decodeDigest, encodeDigest } from "../framing/index.js";
import {
  type ByteSource,
  type ChecksummedIoLogger,
  isClosable,
  SeekWhence,
} from "../io/types.js";

export interface ChecksummedReaderOptions {
  /** Content bytes per block; must match the writer's */
  interval: number;
  /** Must build the same hash the writer used */
  newHash: HashFactory;
  logger?: ChecksummedIoLogger;
}

export class ChecksummedReader {
  private readonly framing: BlockFraming;
  private readonly newHash: HashFactory;
  private readonly logger?: ChecksummedIoLogger;
  private readonly lookahead = new Uint8Array(DIGEST_SIZE);
  /** Content bytes of the current block already behind the cursor */
  private offset = 0;
  private isClosed = false;

  constructor(
    private readonly source: ByteSource,
    options: ChecksummedReaderOptions,
  ) {
    this.framing = new BlockFraming(options.interval);
    this.newHash = options.newHash;
    this.logger = options.logger;
  }

  get interval(): number {
    return this.framing.interval;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Read content bytes into the start of `buffer`.
   *
   * Never crosses a block boundary in one call, so the count may be lower
   * than `buffer.length` while more content remains.
   *
   * @returns Number of content bytes read; `0` at end of stream
   */
  read(buffer: Uint8Array): number {
    this.assertOpen();
    const room = this.framing.interval - this.offset;
    const target = buffer.length > room ? buffer.subarray(0, room) : buffer;
    if (target.length === 0) return 0;

    const count = this.source.read(target);
    if (count === 0) return 0;

    // Either the digest of a block just completed, or a probe that at
    // least a whole digest still follows what was read.
    const following = this.readFully(this.lookahead);
    if (following < DIGEST_SIZE) {
      return this.settleAtEnd(count, following);
    }
    if (this.offset + count === this.framing.interval) {
      this.offset = 0;
    } else {
      this.source.seek(-DIGEST_SIZE, SeekWhence.Current);
      this.offset += count;
    }
    return count;
  }

  /**
   * Move the cursor to a logical offset.
   *
   * @returns The new logical offset
   * @throws InvalidWhenceError for an unknown origin, without moving the source
   * @throws InvalidArgumentError when the target would be negative
   */
  seek(offset: number, whence: SeekWhence = SeekWhence.Start): number {
    this.assertOpen();
    let base: number;
    switch (whence) {
      case SeekWhence.Start:
        base = 0;
        break;
      case SeekWhence.Current:
        base = this.framing.physicalToLogical(this.source.seek(0, SeekWhence.Current));
        break;
      case SeekWhence.End:
        base = this.framing.contentLength(this.source.seek(0, SeekWhence.End));
        break;
      default:
        throw new InvalidWhenceError(whence, this.source.seek(0, SeekWhence.Current));
    }
    const logical = base + offset;
    if (!Number.isSafeInteger(logical) || logical < 0) {
      throw new InvalidArgumentError(`cannot seek to logical offset ${logical}`);
    }
    const physical = this.source.seek(this.framing.logicalToPhysical(logical), SeekWhence.Start);
    this.offset = this.framing.blockOffsetOf(physical);
    return this.framing.physicalToLogical(physical);
  }

  /** Current logical offset */
  tell(): number {
    return this.seek(0, SeekWhence.Current);
  }

  /**
   * Check the digest of the block containing the cursor.
   *
   * The cursor is left where it was. A truncated final block is checked
   * against whatever bytes are present, the last four being its digest.
   *
   * @returns Whether the block content matches its digest
   * @throws The source's error when the block cannot be read; the
   *   block's validity is then unknown
   */
  verify(): boolean {
    this.assertOpen();
    const original = this.source.seek(0, SeekWhence.Current);
    let verified: boolean;
    try {
      verified = this.verifyBlockAt(original - this.offset);
    } catch (error) {
      this.restorePosition(original);
      throw error;
    }
    this.source.seek(original, SeekWhence.Start);
    return verified;
  }

  close(): void {
    if (this.isClosed) {
      throw new StreamClosedError("already closed");
    }
    this.isClosed = true;
    if (isClosable(this.source)) {
      this.source.close();
    }
  }

  /**
   * Fewer than four bytes follow the read, so the tail of what was read is
   * (part of) the final digest. Hide those bytes and park the source at the
   * end of the content.
   */
  private settleAtEnd(count: number, following: number): number {
    const content = Math.max(count - (DIGEST_SIZE - following), 0);
    this.source.seek(-(count + following - content), SeekWhence.Current);
    this.offset += content;
    return content;
  }

  private verifyBlockAt(blockStart: number): boolean {
    this.source.seek(blockStart, SeekWhence.Start);
    const frame = new Uint8Array(this.framing.frameSize);
    const count = this.readFully(frame);
    if (count === 0) {
      // Cursor sits at the very end, after the last digest
      return true;
    }
    if (count <= DIGEST_SIZE) {
      this.logger?.debug?.(`block at ${blockStart} holds only ${count} bytes`);
      return false;
    }

    const hash = this.newHash();
    hash.update(frame.subarray(0, count - DIGEST_SIZE));
    const expected = hash.getValue();
    const stored = frame.subarray(count - DIGEST_SIZE, count);
    const matches = decodeDigest(stored) === expected;
    if (!matches) {
      this.logger?.debug?.(
        `checksum mismatch in block at ${blockStart}: ` +
          `expected ${bytesToHex(encodeDigest(expected))}, stored ${bytesToHex(stored)}`,
      );
    }
    return matches;
  }

  private restorePosition(position: number): void {
    try {
      this.source.seek(position, SeekWhence.Start);
    } catch (error) {
      this.logger?.error?.("failed to restore position after verify error", error);
    }
  }

  private readFully(buffer: Uint8Array): number {
    let total = 0;
    while (total < buffer.length) {
      const count = this.source.read(buffer.subarray(total));
      if (count === 0) break;
      total += count;
    }
    return total;
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new StreamClosedError();
    }
  }
}

/**
 * Create a reader over framed content in `source`.
 *
 * @example
 * ```typescript
 * const reader = createChecksummedReader(source, { interval: 65532, newHash: newCrc32 });
 * reader.seek(100_000, SeekWhence.Start);
 * if (!reader.verify()) throw new Error("corrupt block");
 * ```
 */
export function createChecksummedReader(
  source: ByteSource,
  options: ChecksummedReaderOptions,
): ChecksummedReader {
  return new ChecksummedReader(source, options);
}
