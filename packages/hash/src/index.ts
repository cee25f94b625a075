// Re-export all hash algorithms
export * from "./crc32/index.js";
export * from "./fnv1a/index.js";

export type { Hash32, HashFactory } from "./types/index.js";

// Re-export utilities
export * from "./utils/index.js";
