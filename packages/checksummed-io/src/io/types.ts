/**
 * Collaborator contracts for checksummed streams.
 *
 * All calls are synchronous. Failures are reported by throwing.
 */

/**
 * Origin of a seek: absolute, relative to the cursor, or relative to the end.
 */
export const SeekWhence = {
  Start: 0,
  Current: 1,
  End: 2,
} as const;

export type SeekWhence = (typeof SeekWhence)[keyof typeof SeekWhence];

/**
 * A resource that releases something on close.
 */
export interface Closable {
  close(): void;
}

/**
 * Append-only byte sink.
 */
export interface ByteSink {
  /**
   * Append bytes. Returns how many bytes were accepted; anything
   * less than `data.length` is treated as a failed write.
   */
  write(data: Uint8Array): number;

  close?(): void;
}

/**
 * Seekable byte source.
 */
export interface ByteSource {
  /**
   * Read into `buffer` from the current position.
   * Returns the number of bytes read, `0` at end of source.
   * May return fewer bytes than requested before the end.
   */
  read(buffer: Uint8Array): number;

  /**
   * Move the cursor. Returns the new absolute position.
   */
  seek(offset: number, whence: SeekWhence): number;

  close?(): void;
}

export function isClosable(value: object): value is Closable {
  return "close" in value && typeof value.close === "function";
}

/**
 * Optional logger hooks accepted by readers and writers.
 */
export interface ChecksummedIoLogger {
  debug?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}
