/**
 * Streaming 32-bit hash accumulator.
 *
 * Instances are stateful: bytes fed through `update()` accumulate until
 * `getValue()` is read. Create a new instance for every independent
 * sequence rather than resetting a shared one.
 */
export interface Hash32 {
  /** Feed more bytes into the accumulator */
  update(data: Uint8Array): unknown;

  /** Current 32-bit unsigned digest of everything fed so far */
  getValue(): number;
}

/**
 * Zero-argument constructor of fresh, independent accumulators.
 */
export type HashFactory = () => Hash32;
