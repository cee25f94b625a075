export * from "./fnv1a.js";
