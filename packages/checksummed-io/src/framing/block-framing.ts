/**
 * Block framing: where digests sit in a checksummed stream.
 *
 * Layout:
 *   [content 0 .. interval-1][digest]
 *   [content interval .. 2*interval-1][digest]
 *   ...
 *   [final content, 1 .. interval bytes][digest]
 *
 * Every digest is the 4-byte big-endian value of a 32-bit hash over exactly
 * the content bytes of its own block.
 */

import { InvalidArgumentError } from "../errors/index.js";

/** Size of each embedded digest in bytes */
export const DIGEST_SIZE = 4;

function assertOffset(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${label} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Offset arithmetic for one checksum interval.
 */
export class BlockFraming {
  readonly interval: number;

  constructor(interval: number) {
    if (!Number.isSafeInteger(interval) || interval < 1) {
      throw new InvalidArgumentError(`interval must be a positive integer, got ${interval}`);
    }
    this.interval = interval;
  }

  /** Bytes one full block occupies on disk */
  get frameSize(): number {
    return this.interval + DIGEST_SIZE;
  }

  logicalToPhysical(logical: number): number {
    assertOffset(logical, "logical offset");
    return logical + DIGEST_SIZE * Math.floor(logical / this.interval);
  }

  /**
   * Inverse of `logicalToPhysical`. Offsets inside a digest are out of
   * domain.
   */
  physicalToLogical(physical: number): number {
    assertOffset(physical, "physical offset");
    return physical - DIGEST_SIZE * Math.floor(physical / this.frameSize);
  }

  /** Content bytes between the start of the containing block and `physical` */
  blockOffsetOf(physical: number): number {
    assertOffset(physical, "physical offset");
    return physical % this.frameSize;
  }

  blockCount(contentLength: number): number {
    assertOffset(contentLength, "content length");
    return Math.ceil(contentLength / this.interval);
  }

  /** Total stream size for `contentLength` content bytes */
  physicalLength(contentLength: number): number {
    return contentLength + DIGEST_SIZE * this.blockCount(contentLength);
  }

  /**
   * Content bytes in a whole stream of `physicalLength` bytes.
   *
   * The trailing 4 bytes of a stream always belong to a digest, so a
   * remainder of 4 bytes or fewer carries no content.
   */
  contentLength(physicalLength: number): number {
    assertOffset(physicalLength, "physical length");
    const frames = Math.floor(physicalLength / this.frameSize);
    const rest = physicalLength % this.frameSize;
    return frames * this.interval + Math.max(rest - DIGEST_SIZE, 0);
  }
}

export function encodeDigest(value: number, target = new Uint8Array(DIGEST_SIZE)): Uint8Array {
  new DataView(target.buffer, target.byteOffset, DIGEST_SIZE).setUint32(0, value >>> 0, false);
  return target;
}

export function decodeDigest(bytes: Uint8Array): number {
  if (bytes.length < DIGEST_SIZE) {
    throw new InvalidArgumentError(`digest needs ${DIGEST_SIZE} bytes, got ${bytes.length}`);
  }
  return new DataView(bytes.buffer, bytes.byteOffset, DIGEST_SIZE).getUint32(0, false);
}
