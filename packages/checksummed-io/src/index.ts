export * from "./errors/index.js";
export * from "./framing/index.js";
export * from "./io/index.js";
export * from "./reader/index.js";
export * from "./writer/index.js";
