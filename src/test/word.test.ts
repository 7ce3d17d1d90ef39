import { describe, it, expect } from "vitest";
import {
  CorruptionError,
  decodeWord,
  encodeWord,
  MAX_WORD_SIZE,
  Reader,
  Writer,
} from "../index.js";
import { fitsWord, maxWord, zigzagDecode, zigzagEncode } from "../codec/index.js";
import { thrown } from "./grammar.js";

describe("word codec", () => {
  it("encodes zero as no bytes", () => {
    expect(encodeWord(0n)).toEqual(new Uint8Array(0));
    expect(decodeWord(new Uint8Array(0))).toBe(0n);
  });

  it("strips leading zero bytes", () => {
    expect(Array.from(encodeWord(1n))).toEqual([0x01]);
    expect(Array.from(encodeWord(255n))).toEqual([0xff]);
    expect(Array.from(encodeWord(256n))).toEqual([0x01, 0x00]);
    expect(Array.from(encodeWord(2n ** 31n - 1n))).toEqual([0x7f, 0xff, 0xff, 0xff]);
  });

  it("encodes the largest word in full", () => {
    const max = maxWord(8);
    expect(max).toBe(0xffffffffffffffffn);
    expect(Array.from(encodeWord(max))).toEqual(new Array(8).fill(0xff));
  });

  it("round-trips the boundary values", () => {
    for (const value of [0n, 1n, 255n, 2n ** 31n - 1n, maxWord(8)]) {
      expect(decodeWord(encodeWord(value))).toBe(value);
    }
  });

  it("honours smaller and larger word sizes", () => {
    expect(fitsWord(0xffffffffn, 4)).toBe(true);
    expect(fitsWord(0x100000000n, 4)).toBe(false);
    expect(Array.from(encodeWord(2n ** 112n, MAX_WORD_SIZE))).toEqual([1, ...new Array(14).fill(0)]);
  });

  it("rejects values that do not fit", () => {
    expect(() => encodeWord(-1n)).toThrow(RangeError);
    expect(() => encodeWord(2n ** 32n, 4)).toThrow(RangeError);
  });

  it("rejects word sizes a 4-bit length cannot describe", () => {
    expect(() => encodeWord(1n, 0)).toThrow(RangeError);
    expect(() => encodeWord(1n, 16)).toThrow(RangeError);
  });

  it("encodes ordinals as words", () => {
    expect(Array.from(encodeWord(0n))).toEqual([]);
    expect(Array.from(encodeWord(300n))).toEqual([0x01, 0x2c]);
  });
});

describe("primitives", () => {
  it("zigzag maps signed to unsigned without a width limit", () => {
    expect(zigzagEncode(0n)).toBe(0n);
    expect(zigzagEncode(-1n)).toBe(1n);
    expect(zigzagEncode(1n)).toBe(2n);
    const big = -(2n ** 70n);
    expect(zigzagDecode(zigzagEncode(big))).toBe(big);
  });

  it("reads back what the writer wrote", () => {
    const writer = new Writer(4);
    writer.writeVarintNumber(300);
    writer.writeString("héllo");
    writer.writeOptionalString(undefined);
    writer.writeOptionalString("x");
    writer.writeFloat64(-2.5);

    const reader = new Reader(writer.finish());
    expect(reader.readVarintNumber()).toBe(300);
    expect(reader.readString()).toBe("héllo");
    expect(reader.readOptionalString()).toBeUndefined();
    expect(reader.readOptionalString()).toBe("x");
    expect(reader.readFloat64()).toBe(-2.5);
    expect(reader.hasMore()).toBe(false);
  });

  it("reports word lengths above the word size", () => {
    const reader = new Reader(new Uint8Array([1, 2, 3, 4, 5]), 100);
    const error = thrown(() => reader.readWord(5, 4));
    expect(error).toBeInstanceOf(CorruptionError);
    expect(error).toMatchObject({ code: "E004", offset: 100 });
  });

  it("reports truncation with the absolute offset", () => {
    const reader = new Reader(new Uint8Array([0x80]), 10);
    const error = thrown(() => reader.readVarint());
    expect(error).toMatchObject({ code: "E005", offset: 11 });
  });

  it("rejects strings above the limit and invalid UTF-8", () => {
    expect(thrown(() => new Reader(new Uint8Array([3, 0x61, 0x62, 0x63])).readString(2))).toMatchObject({
      code: "E005",
    });
    expect(thrown(() => new Reader(new Uint8Array([1, 0xff])).readString())).toMatchObject({ code: "E004" });
  });
});
