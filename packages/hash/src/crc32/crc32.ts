/**
 * CRC32 checksum implementation
 *
 * Standard CRC32 with IEEE polynomial (used in ZIP, PNG, gzip, etc.)
 */

import type { Hash32, HashFactory } from "../types/index.js";

/**
 * CRC32 lookup table (IEEE polynomial 0xEDB88320)
 */
const CRC32_TABLE = makeCRC32Table();

function makeCRC32Table(): Uint32Array {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let crc = i;
    for (let j = 0; j < 8; j++) {
      crc = crc & 1 ? 0xedb88320 ^ (crc >>> 1) : crc >>> 1;
    }
    table[i] = crc;
  }
  return table;
}

function updateCRC32(crc: number, data: Uint8Array): number {
  for (let i = 0; i < data.length; i++) {
    crc = CRC32_TABLE[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return crc;
}

/**
 * Compute CRC32 checksum of data
 *
 * @param data Data to checksum
 * @returns CRC32 value (finalized)
 */
export function crc32(data: Uint8Array): number {
  return (updateCRC32(0xffffffff, data) ^ 0xffffffff) >>> 0;
}

/**
 * Incremental CRC32 calculator for streaming data
 */
export class CRC32 implements Hash32 {
  private crc = 0xffffffff;

  /**
   * Update the checksum with additional data
   *
   * @param data Data chunk to process
   */
  update(data: Uint8Array): this {
    this.crc = updateCRC32(this.crc, data);
    return this;
  }

  /**
   * Get the current CRC32 value (finalized)
   *
   * @returns 32-bit unsigned CRC32 checksum
   */
  getValue(): number {
    return (this.crc ^ 0xffffffff) >>> 0;
  }
}

/** Factory producing a fresh CRC32 accumulator on every call */
export const newCrc32: HashFactory = () => new CRC32();
