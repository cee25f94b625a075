export * from "./memory-byte-sink.js";
export * from "./memory-byte-source.js";
export * from "./types.js";
