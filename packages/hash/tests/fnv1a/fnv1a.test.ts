import { describe, expect, it } from "vitest";
import { FNV1a32, fnv1a32, newFnv1a32 } from "../../src/fnv1a/fnv1a.js";

const encoder = new TextEncoder();

describe("fnv1a32", () => {
  it("returns the offset basis for empty input", () => {
    expect(fnv1a32(new Uint8Array([]))).toBe(0x811c9dc5);
  });

  it("hashes a single byte", () => {
    expect(fnv1a32(encoder.encode("a"))).toBe(0xe40c292c);
  });

  it("hashes a short string", () => {
    expect(fnv1a32(encoder.encode("foobar"))).toBe(0xbf9cf968);
  });
});

describe("FNV1a32", () => {
  it("matches the one-shot function across split updates", () => {
    const calc = new FNV1a32();
    calc.update(encoder.encode("foo")).update(encoder.encode("bar"));
    expect(calc.getValue()).toBe(0xbf9cf968);
  });

  it("factory creates fresh accumulators", () => {
    const used = newFnv1a32();
    used.update(encoder.encode("a"));
    expect(newFnv1a32().getValue()).toBe(0x811c9dc5);
    expect(used.getValue()).toBe(0xe40c292c);
  });
});
