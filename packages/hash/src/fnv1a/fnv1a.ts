/**
 * FNV-1a hash implementation
 *
 * A simple, fast non-cryptographic hash function.
 * Uses the FNV-1a algorithm with 32-bit output over raw bytes.
 */

import type { Hash32, HashFactory } from "../types/index.js";

/** FNV-1a offset basis (32-bit) */
const FNV_OFFSET_BASIS = 2166136261;

/** FNV-1a prime (32-bit) */
const FNV_PRIME = 16777619;

function updateFnv1a(hash: number, data: Uint8Array): number {
  for (let i = 0; i < data.length; i++) {
    hash ^= data[i];
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash;
}

/**
 * Compute FNV-1a hash of bytes
 *
 * @returns 32-bit unsigned hash
 */
export function fnv1a32(data: Uint8Array): number {
  return updateFnv1a(FNV_OFFSET_BASIS, data) >>> 0;
}

/**
 * Incremental FNV-1a calculator.
 */
export class FNV1a32 implements Hash32 {
  private hash = FNV_OFFSET_BASIS;

  update(data: Uint8Array): this {
    this.hash = updateFnv1a(this.hash, data);
    return this;
  }

  getValue(): number {
    return this.hash >>> 0;
  }
}

export const newFnv1a32: HashFactory = () => new FNV1a32();
