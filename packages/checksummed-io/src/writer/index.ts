export * from "./checksummed-writer.js";
