import { describe, it, expect } from "vitest";
import {
  CorruptionError,
  createNode,
  decodeBase85,
  encodeBase85,
  literal,
  reconstructFromText,
  serialize,
  serializeToText,
} from "../index.js";
import { grammar, lcgBytes, signature, testEnvironment, thrown } from "./grammar.js";

describe("base-85", () => {
  it("encodes empty input as a bare header", () => {
    expect(encodeBase85(new Uint8Array(0))).toBe(" A");
    expect(decodeBase85(" A")).toEqual(new Uint8Array(0));
  });

  it("encodes a partial group with its tail length", () => {
    const text = encodeBase85(new TextEncoder().encode("AB"));
    expect(text).toBe(" CU,&vu");
    expect(new TextDecoder().decode(decodeBase85(text))).toBe("AB");
  });

  it("encodes the largest group", () => {
    expect(encodeBase85(new Uint8Array([0xff, 0xff, 0xff, 0xff]))).toBe(" A,X2MA");
  });

  it("breaks lines after fourteen groups", () => {
    const text = encodeBase85(new Uint8Array(56));
    expect(text).toBe(` A${"A".repeat(70)}\n `);
    expect(encodeBase85(new Uint8Array(60)).split("\n")).toHaveLength(2);
  });

  it("round-trips 4096 pseudo-random bytes", () => {
    const data = lcgBytes(4096);
    const text = encodeBase85(data);
    expect(text).toHaveLength(2 + 1024 * 5 + 73 * 2);
    expect(decodeBase85(text)).toEqual(data);
  });

  it("round-trips every tail length", () => {
    for (let length = 1; length <= 9; length++) {
      const data = lcgBytes(length, length);
      expect(decodeBase85(encodeBase85(data))).toEqual(data);
    }
  });

  it("stays clear of quoting characters", () => {
    const text = encodeBase85(lcgBytes(4096, 99));
    expect(/["'\\#{}]/.test(text)).toBe(false);
  });

  it("skips characters outside the alphabet", () => {
    expect(new TextDecoder().decode(decodeBase85(' C\tU,"&\n v u'))).toBe("AB");
  });

  it("detects a corrupted digit", () => {
    const text = encodeBase85(lcgBytes(4096));
    const lastDamaged = text.slice(0, -1) + " ";
    expect(thrown(() => decodeBase85(lastDamaged))).toMatchObject({ code: "E005", offset: text.length });

    const firstDamaged = text.slice(0, 10) + " " + text.slice(11);
    expect(thrown(() => decodeBase85(firstDamaged))).toBeInstanceOf(CorruptionError);
  });

  it("rejects a tail length above four", () => {
    expect(thrown(() => decodeBase85(" FAAAAA"))).toMatchObject({ code: "E004", offset: 1 });
  });

  it("rejects a group above 32 bits", () => {
    expect(thrown(() => decodeBase85(" A|||||"))).toMatchObject({ code: "E004" });
  });

  it("rejects a missing header and a tail without data", () => {
    expect(thrown(() => decodeBase85(""))).toMatchObject({ code: "E005" });
    expect(thrown(() => decodeBase85(" \n "))).toMatchObject({ code: "E005" });
    expect(thrown(() => decodeBase85(" B"))).toMatchObject({ code: "E005" });
  });
});

describe("text transport", () => {
  it("carries a graph through base-85 text", () => {
    const shared = createNode({ kind: "Leaf", slots: [literal.string("quoted \"text\"")] });
    const root = createNode({ kind: "Call", slots: [shared, "puts", shared], extra: 2n });
    const text = serializeToText(root, { shapes: grammar, environment: testEnvironment });

    expect(text.startsWith(" ")).toBe(true);
    expect(text.includes('"')).toBe(false);

    const copy = reconstructFromText(text, { environment: testEnvironment });
    expect(signature(copy)).toEqual(signature(root));
    expect(copy.slots[0]).toBe(copy.slots[2]);
  });

  it("matches the binary container", () => {
    const root = createNode({ kind: "Int", slots: [42n] });
    const options = { shapes: grammar, environment: testEnvironment };
    expect(Array.from(decodeBase85(serializeToText(root, options)))).toEqual(Array.from(serialize(root, options)));
  });
});
