import { describe, it, expect } from "vitest";
import { InternTable, InternTables, createBinding, literal } from "../index.js";

describe("InternTable", () => {
  it("assigns dense ordinals in first-seen order", () => {
    const table = new InternTable<string>();
    expect(table.intern("b", "b")).toBe(0);
    expect(table.intern("a", "a")).toBe(1);
    expect(table.intern("c", "c")).toBe(2);
    expect(table.payloadsInOrder()).toEqual(["b", "a", "c"]);
  });

  it("is idempotent and keeps the first payload", () => {
    const table = new InternTable<string, number>();
    expect(table.intern("x", 1)).toBe(0);
    expect(table.intern("x", 2)).toBe(0);
    expect(table.size).toBe(1);
    expect(table.payloadsInOrder()).toEqual([1]);
  });

  it("answers membership queries", () => {
    const table = new InternTable<string>();
    table.intern("x", "x");
    expect(table.has("x")).toBe(true);
    expect(table.ordinalOf("x")).toBe(0);
    expect(table.has("y")).toBe(false);
    expect(table.ordinalOf("y")).toBeUndefined();
  });
});

describe("InternTables", () => {
  it("keeps one table per category", () => {
    const tables = new InternTables();
    tables.intern("symbol", "foo", "foo");
    tables.intern("symbol", 7, 7);
    const value = literal.int(1);
    tables.intern("value", value, value);

    expect(tables.size("symbol")).toBe(2);
    expect(tables.size("value")).toBe(1);
    expect(tables.size("binding")).toBe(0);
    expect(tables.payloadsInOrder("symbol")).toEqual(["foo", 7]);
  });

  it("keys symbols by name and everything else by identity", () => {
    const tables = new InternTables();
    expect(tables.intern("symbol", "foo", "foo")).toBe(0);
    expect(tables.intern("symbol", "foo", "foo")).toBe(0);

    const a = literal.string("same");
    const b = literal.string("same");
    expect(tables.intern("value", a, a)).toBe(0);
    expect(tables.intern("value", b, b)).toBe(1);
    expect(tables.intern("value", a, a)).toBe(0);

    const first = createBinding("$x");
    const second = createBinding("$x");
    tables.intern("binding", first, first);
    tables.intern("binding", second, second);
    expect(tables.size("binding")).toBe(2);
    expect(tables.ordinalOf("binding", second)).toBe(1);
  });
});
