export * from "./checksummed-reader.js";
export * from "./scan-blocks.js";
