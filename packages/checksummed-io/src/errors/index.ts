/**
 * Checksummed stream error classes.
 */

/**
 * Base error for all checksummed stream operations.
 */
export class ChecksummedIoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChecksummedIoError";
  }
}

/**
 * Operation attempted on a closed (or poisoned) reader or writer.
 */
export class StreamClosedError extends ChecksummedIoError {
  constructor(message = "closed") {
    super(message);
    this.name = "StreamClosedError";
  }
}

/**
 * Seek called with an unknown origin.
 *
 * `position` is the source's physical position, left untouched.
 */
export class InvalidWhenceError extends ChecksummedIoError {
  readonly whence: number;
  readonly position: number;

  constructor(whence: number, position: number) {
    super(`invalid whence ${whence}`);
    this.name = "InvalidWhenceError";
    this.whence = whence;
    this.position = position;
  }
}

/**
 * Bad interval, negative offset, or similar caller mistake.
 */
export class InvalidArgumentError extends ChecksummedIoError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * A sink accepted fewer bytes than it was given.
 */
export class ShortWriteError extends ChecksummedIoError {
  readonly requested: number;
  readonly written: number;

  constructor(requested: number, written: number) {
    super(`short write: ${written} of ${requested} bytes`);
    this.name = "ShortWriteError";
    this.requested = requested;
    this.written = written;
  }
}

/**
 * Sink failure while writing content or a digest.
 *
 * `bytesWritten` counts content bytes the sink confirmed before the
 * failure. The writer is poisoned afterwards.
 */
export class ChecksummedWriteError extends ChecksummedIoError {
  readonly bytesWritten: number;

  constructor(bytesWritten: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`write failed after ${bytesWritten} bytes: ${reason}`, { cause });
    this.name = "ChecksummedWriteError";
    this.bytesWritten = bytesWritten;
  }
}
