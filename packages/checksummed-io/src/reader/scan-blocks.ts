import { SeekWhence } from "../io/types.js";
import type { ChecksummedReader } from "./checksummed-reader.js";

export interface BlockScanResult {
  /** Number of blocks in the stream */
  blocks: number;
  /** Zero-based indices of blocks whose digest does not match */
  corrupt: number[];
}

/**
 * Verify every block of the stream behind `reader`.
 *
 * The reader's logical position is restored afterwards, also when a
 * verification throws.
 */
export function scanBlocks(reader: ChecksummedReader): BlockScanResult {
  const original = reader.tell();
  try {
    const contentLength = reader.seek(0, SeekWhence.End);
    const blocks = Math.ceil(contentLength / reader.interval);
    const corrupt: number[] = [];
    for (let index = 0; index < blocks; index++) {
      reader.seek(index * reader.interval, SeekWhence.Start);
      if (!reader.verify()) corrupt.push(index);
    }
    return { blocks, corrupt };
  } finally {
    reader.seek(original, SeekWhence.Start);
  }
}
