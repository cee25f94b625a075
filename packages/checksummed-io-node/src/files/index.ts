/**
 * File-backed checksummed readers and writers
 */

import {
  type ChecksummedReader,
  type ChecksummedReaderOptions,
  type ChecksummedWriter,
  type ChecksummedWriterOptions,
  createChecksummedReader,
  createChecksummedWriter,
} from "@blockframe/checksummed-io";
import { FileByteSink } from "./file-byte-sink.js";
import { FileByteSource } from "./file-byte-source.js";

/**
 * Open a framed file for reading. Closing the reader closes the file.
 *
 * @example
 * ```typescript
 * const reader = openChecksummedFileReader("/data/segment.bin", {
 *   interval: 65532,
 *   newHash: newCrc32,
 * });
 * ```
 */
export function openChecksummedFileReader(
  path: string,
  options: ChecksummedReaderOptions,
): ChecksummedReader {
  const source = FileByteSource.open(path);
  try {
    return createChecksummedReader(source, options);
  } catch (error) {
    source.close();
    throw error;
  }
}

/**
 * Create (or truncate) a file and frame content into it. Closing the
 * writer emits the final digest and closes the file.
 */
export function createChecksummedFileWriter(
  path: string,
  options: ChecksummedWriterOptions,
): ChecksummedWriter {
  const sink = FileByteSink.create(path);
  try {
    return createChecksummedWriter(sink, options);
  } catch (error) {
    sink.close();
    throw error;
  }
}

export { FileByteSink, FileByteSource };
