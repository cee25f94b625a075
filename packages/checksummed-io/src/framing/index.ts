export * from "./block-framing.js";
