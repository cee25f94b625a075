import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../../src/errors/index.js";
import {
  BlockFraming,
  DIGEST_SIZE,
  decodeDigest,
  encodeDigest,
} from "../../src/framing/block-framing.js";

describe("BlockFraming", () => {
  const framing = new BlockFraming(16);

  describe("constructor", () => {
    it("rejects a zero interval", () => {
      expect(() => new BlockFraming(0)).toThrow(InvalidArgumentError);
    });

    it("rejects a fractional interval", () => {
      expect(() => new BlockFraming(1.5)).toThrow("interval must be a positive integer, got 1.5");
    });

    it("exposes the frame size", () => {
      expect(framing.frameSize).toBe(20);
      expect(DIGEST_SIZE).toBe(4);
    });
  });

  describe("logicalToPhysical", () => {
    it("skips one digest per completed block", () => {
      expect(framing.logicalToPhysical(0)).toBe(0);
      expect(framing.logicalToPhysical(15)).toBe(15);
      expect(framing.logicalToPhysical(16)).toBe(20);
      expect(framing.logicalToPhysical(31)).toBe(35);
      expect(framing.logicalToPhysical(32)).toBe(40);
      expect(framing.logicalToPhysical(40)).toBe(48);
    });

    it("rejects negative offsets", () => {
      expect(() => framing.logicalToPhysical(-1)).toThrow(InvalidArgumentError);
    });
  });

  describe("physicalToLogical", () => {
    it("maps block starts and content bytes back", () => {
      expect(framing.physicalToLogical(0)).toBe(0);
      expect(framing.physicalToLogical(20)).toBe(16);
      expect(framing.physicalToLogical(35)).toBe(31);
      expect(framing.physicalToLogical(40)).toBe(32);
      expect(framing.physicalToLogical(48)).toBe(40);
    });

    it("inverts logicalToPhysical for every interval", () => {
      for (const interval of [1, 2, 3, 7, 16, 100]) {
        const f = new BlockFraming(interval);
        for (let logical = 0; logical <= 5 * interval + 3; logical++) {
          expect(f.physicalToLogical(f.logicalToPhysical(logical))).toBe(logical);
        }
      }
    });
  });

  describe("blockOffsetOf", () => {
    it("returns the position inside the frame", () => {
      expect(framing.blockOffsetOf(0)).toBe(0);
      expect(framing.blockOffsetOf(20)).toBe(0);
      expect(framing.blockOffsetOf(25)).toBe(5);
    });
  });

  describe("stream lengths", () => {
    it("adds one digest for a partial block", () => {
      expect(framing.physicalLength(10)).toBe(14);
    });

    it("adds no empty block for an exact multiple", () => {
      expect(framing.physicalLength(32)).toBe(40);
      expect(framing.blockCount(32)).toBe(2);
    });

    it("frames empty content as nothing", () => {
      expect(framing.physicalLength(0)).toBe(0);
      expect(framing.blockCount(0)).toBe(0);
    });

    it("counts a trailing partial block", () => {
      expect(framing.physicalLength(33)).toBe(45);
      expect(framing.blockCount(33)).toBe(3);
    });

    it("recovers content length from a whole stream", () => {
      expect(framing.contentLength(0)).toBe(0);
      expect(framing.contentLength(14)).toBe(10);
      expect(framing.contentLength(40)).toBe(32);
      expect(framing.contentLength(45)).toBe(33);
    });

    it("treats a truncated trailing digest as carrying no content", () => {
      expect(framing.contentLength(22)).toBe(16);
      expect(framing.contentLength(3)).toBe(0);
    });

    it("inverts physicalLength", () => {
      for (let length = 0; length <= 100; length++) {
        expect(framing.contentLength(framing.physicalLength(length))).toBe(length);
      }
    });
  });
});

describe("digest encoding", () => {
  it("writes big-endian bytes", () => {
    expect(Array.from(encodeDigest(0x01020304))).toEqual([1, 2, 3, 4]);
    expect(Array.from(encodeDigest(0xffffffff))).toEqual([255, 255, 255, 255]);
  });

  it("writes into a view with an offset", () => {
    const backing = new Uint8Array(8);
    encodeDigest(0xcafebabe, backing.subarray(2, 6));
    expect(Array.from(backing)).toEqual([0, 0, 0xca, 0xfe, 0xba, 0xbe, 0, 0]);
  });

  it("reads big-endian bytes", () => {
    expect(decodeDigest(new Uint8Array([0xca, 0xfe, 0xba, 0xbe]))).toBe(0xcafebabe);
  });

  it("rejects short input", () => {
    expect(() => decodeDigest(new Uint8Array(3))).toThrow("digest needs 4 bytes, got 3");
  });
});
