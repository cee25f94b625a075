import { describe, expect, it } from "vitest";
import { MemoryByteSink } from "../../src/io/memory-byte-sink.js";

describe("MemoryByteSink", () => {
  it("accumulates writes beyond its initial capacity", () => {
    const sink = new MemoryByteSink(2);
    expect(sink.write(new Uint8Array([1, 2, 3]))).toBe(3);
    expect(sink.write(new Uint8Array([4, 5]))).toBe(2);
    expect(sink.length).toBe(5);
    expect(Array.from(sink.toBytes())).toEqual([1, 2, 3, 4, 5]);
  });

  it("returns a copy", () => {
    const sink = new MemoryByteSink();
    sink.write(new Uint8Array([1]));
    const snapshot = sink.toBytes();
    sink.write(new Uint8Array([2]));
    expect(Array.from(snapshot)).toEqual([1]);
  });

  it("rejects writes after close", () => {
    const sink = new MemoryByteSink();
    sink.close();
    expect(sink.closed).toBe(true);
    expect(() => sink.write(new Uint8Array([1]))).toThrow("MemoryByteSink is closed");
    expect(() => sink.close()).toThrow("MemoryByteSink is already closed");
  });
});
