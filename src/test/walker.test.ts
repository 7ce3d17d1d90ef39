import { describe, it, expect } from "vitest";
import {
  createArgsRecord,
  createBinding,
  createIdentifierGroup,
  createNode,
  literal,
  SchemaError,
  ShapeTableBuilder,
  SlotKind,
  walk,
  type GraphNode,
  type Literal,
  type ShapeDescriptor,
} from "../index.js";
import { grammar, thrown } from "./grammar.js";

function leaf(value: Literal | null = null): GraphNode {
  return createNode({ kind: "Leaf", slots: [value] });
}

describe("walk", () => {
  it("numbers nodes in pre-order with the root first", () => {
    const l1 = leaf();
    const l2 = leaf();
    const l3 = leaf();
    const inner = createNode({ kind: "Branch", slots: [l1, l2] });
    const root = createNode({ kind: "Branch", slots: [inner, l3] });

    const form = walk(root, grammar);
    expect(form.nodes.map((entry) => entry.node)).toEqual([root, inner, l1, l2, l3]);
    expect(form.nodes[0].node).toBe(root);
    expect(form.nodes[2].node).toBe(l1);
    expect(form.kinds.payloadsInOrder()).toEqual(["Branch", "Leaf"]);
  });

  it("visits a shared node once", () => {
    const shared = leaf();
    const root = createNode({ kind: "Branch", slots: [shared, shared] });
    const form = walk(root, grammar);
    expect(form.nodes).toHaveLength(2);
  });

  it("terminates on cycles", () => {
    const root = createNode({ kind: "Branch" });
    const child = createNode({ kind: "Branch", slots: [root] });
    root.slots[0] = child;
    root.slots[1] = root;
    const form = walk(root, grammar);
    expect(form.nodes.map((entry) => entry.node)).toEqual([root, child]);
  });

  it("walks deep chains without recursion", () => {
    let head = leaf();
    for (let i = 0; i < 100_000; i++) {
      head = createNode({ kind: "Branch", slots: [head] });
    }
    expect(walk(head, grammar).nodes).toHaveLength(100_001);
  });

  it("interns symbols from every category in first-seen order", () => {
    const opt = leaf();
    const root = createNode({
      kind: "Scope",
      slots: [
        createIdentifierGroup(["a", "b"]),
        createNode({ kind: "Call", slots: [null, "puts", null] }),
        createArgsRecord({ restArg: "rest", blockArg: "blk", optArgs: opt }),
      ],
    });

    const form = walk(root, grammar);
    expect(form.tables.payloadsInOrder("symbol")).toEqual(["a", "b", "rest", "blk", "puts"]);
    expect(form.tables.size("identifierGroup")).toBe(1);
    expect(form.tables.size("argsRecord")).toBe(1);
    expect(form.nodes.map((entry) => entry.node.kind)).toEqual(["Scope", "Call", "Leaf"]);
    expect(form.nodes[2].node).toBe(opt);
  });

  it("interns binding names and values by identity", () => {
    const one = literal.int(1);
    const global = createBinding("$stdout");
    const root = createNode({
      kind: "Branch",
      slots: [
        createNode({ kind: "GlobalVar", slots: [global] }),
        createNode({ kind: "Branch", slots: [leaf(one), leaf(one)] }),
      ],
    });
    const form = walk(root, grammar);
    expect(form.tables.payloadsInOrder("binding")).toEqual([global]);
    expect(form.tables.payloadsInOrder("symbol")).toEqual(["$stdout"]);
    expect(form.tables.payloadsInOrder("value")).toEqual([one]);
  });

  it("records the refined shape of each node", () => {
    const target = leaf();
    const root = createNode({ kind: "Attr", slots: [target, "at", 4n] });
    const form = walk(root, grammar);
    expect(form.nodes[0].shape).toEqual([SlotKind.ChildNode, SlotKind.Symbol, SlotKind.RawLong]);
    expect(form.nodes[1].shape).toEqual([SlotKind.Value, SlotKind.None, SlotKind.None]);
  });

  describe("schema violations", () => {
    const cases: Array<[string, () => GraphNode]> = [
      ["unknown kind", () => createNode({ kind: "Mystery" })],
      ["non-node in a child slot", () => createNode({ kind: "Branch", slots: [literal.nil()] })],
      ["node in a value slot", () => createNode({ kind: "Leaf", slots: [leaf()] })],
      ["non-empty None slot", () => createNode({ kind: "Leaf", slots: [null, 1n] })],
      ["negative raw word", () => createNode({ kind: "Int", slots: [-1n] })],
      ["raw word too wide", () => createNode({ kind: "Int", slots: [2n ** 64n] })],
      ["fractional symbol", () => createNode({ kind: "Call", slots: [null, 1.5, null] })],
      ["wrong record in a binding slot", () => createNode({ kind: "GlobalVar", slots: [createIdentifierGroup([])] })],
      ["malformed args record", () => createNode({ kind: "Scope", slots: [null, null, createArgsRecord({ preArgsNum: -1 })] })],
      ["negative name in an identifier group", () => createNode({ kind: "Scope", slots: [createIdentifierGroup([-3])] })],
      ["NaN float", () => leaf(literal.float(Number.NaN))],
      ["extra too wide", () => createNode({ kind: "Leaf", extra: 2n ** 64n })],
    ];

    for (const [name, build] of cases) {
      it(`rejects ${name}`, () => {
        const error = thrown(() => walk(build(), grammar));
        expect(error).toBeInstanceOf(SchemaError);
        expect(error).toMatchObject({ code: "E003", nodeIndex: 0 });
      });
    }

    it("reports the kind and index of the offending node", () => {
      const root = createNode({ kind: "Branch", slots: [leaf(), createNode({ kind: "Int", slots: [-5n] })] });
      const error = thrown(() => walk(root, grammar));
      expect(error).toMatchObject({ kind: "Int", nodeIndex: 2 });
    });

    it("names the node whose override returns a malformed shape", () => {
      const malformed: ShapeDescriptor = [SlotKind.None, SlotKind.None, SlotKind.None];
      Reflect.set(malformed, 1, 42);
      const shapes = new ShapeTableBuilder()
        .kind("Branch", [SlotKind.ChildNode, SlotKind.ChildNode, SlotKind.None])
        .kind("Odd", [SlotKind.None, SlotKind.None, SlotKind.None])
        .refine("Odd", () => malformed)
        .build();
      const root = createNode({ kind: "Branch", slots: [createNode({ kind: "Odd" })] });
      const error = thrown(() => walk(root, shapes));
      expect(error).toBeInstanceOf(SchemaError);
      expect(error).toMatchObject({ kind: "Odd", nodeIndex: 1 });
      expect(error).toHaveProperty("message", "[E003] node 1 (Odd): shape of Odd contains an unknown slot kind");
    });

    it("rejects literals nested too deeply", () => {
      let value = literal.nil();
      for (let i = 0; i < 70; i++) {
        value = literal.array([value]);
      }
      expect(() => walk(leaf(value), grammar)).toThrow(SchemaError);
    });

    it("checks raw words against the configured word size", () => {
      const root = createNode({ kind: "Int", slots: [0x1_0000n] });
      expect(() => walk(root, grammar, { wordSize: 2 })).toThrow(SchemaError);
      expect(walk(root, grammar, { wordSize: 3 }).nodes).toHaveLength(1);
    });
  });
});
