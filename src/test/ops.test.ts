import { describe, it, expect } from "vitest";
import {
  createArgsRecord,
  createBinding,
  createIdentifierGroup,
  createNode,
  defaultEnvironment,
  isArgsRecord,
  isBinding,
  isGraphNode,
  isIdentifierGroup,
  isLiteral,
  isSymbolName,
  literal,
  resolveEnvironment,
} from "../index.js";

describe("createNode", () => {
  it("fills missing slots and extra", () => {
    expect(createNode({ kind: "Leaf" })).toEqual({
      type: "node",
      kind: "Leaf",
      slots: [null, null, null],
      extra: 0n,
    });
  });

  it("keeps given slots and converts numeric extra", () => {
    const node = createNode({ kind: "Int", slots: [0n, "x"], extra: 12 });
    expect(node.slots).toEqual([0n, "x", null]);
    expect(node.extra).toBe(12n);
  });

  it("rejects more than three slots", () => {
    expect(() => createNode({ kind: "Wide", slots: [null, null, null, null] })).toThrow(RangeError);
  });
});

describe("record constructors", () => {
  it("defaults every args field", () => {
    expect(createArgsRecord()).toEqual({
      type: "argsRecord",
      preInit: null,
      postInit: null,
      preArgsNum: 0,
      postArgsNum: 0,
      firstPostArg: null,
      restArg: null,
      blockArg: null,
      kwArgs: null,
      kwRestArg: null,
      optArgs: null,
    });
  });

  it("copies identifier names", () => {
    const names = ["a", "b"];
    const group = createIdentifierGroup(names);
    names.push("c");
    expect(group.names).toEqual(["a", "b"]);
  });

  it("narrows slot values by type", () => {
    expect(isGraphNode(createNode({ kind: "Leaf" }))).toBe(true);
    expect(isArgsRecord(createArgsRecord())).toBe(true);
    expect(isBinding(createBinding("$x"))).toBe(true);
    expect(isIdentifierGroup(createIdentifierGroup([]))).toBe(true);
    expect(isLiteral(literal.nil())).toBe(true);
    expect(isLiteral({ type: "node" })).toBe(false);
    expect(isSymbolName("x")).toBe(true);
    expect(isSymbolName(4)).toBe(true);
    expect(isSymbolName(-1)).toBe(false);
    expect(isSymbolName(1.5)).toBe(false);
  });
});

describe("literal", () => {
  it("builds tagged literals", () => {
    expect(literal.int(3)).toEqual({ type: "int", value: 3n });
    expect(literal.regexp("a")).toEqual({ type: "regexp", source: "a", flags: "" });
    expect(literal.range(literal.nil(), literal.nil())).toMatchObject({ type: "range", exclusive: false });
  });

  it("returns a new object on every call", () => {
    expect(literal.nil()).not.toBe(literal.nil());
  });
});

describe("environment", () => {
  it("describes the running process", () => {
    const environment = defaultEnvironment();
    expect(environment.platform).toBe(`${process.arch}-${process.platform}`);
    expect(environment.version).toBe(process.versions.node);
    expect(environment.wordSize).toBe(8);
  });

  it("fills missing fields from the defaults", () => {
    expect(resolveEnvironment({ platform: "custom" })).toEqual({
      platform: "custom",
      version: process.versions.node,
      wordSize: 8,
    });
  });

  it("rejects unusable word sizes", () => {
    expect(() => resolveEnvironment({ wordSize: 16 })).toThrow(RangeError);
  });
});
