import { describe, it, expect } from "vitest";
import {
  createArgsRecord,
  createBinding,
  createIdentifierGroup,
  createNode,
  formatGraph,
  formatLiteral,
  literal,
  SchemaError,
} from "../index.js";
import { grammar } from "./grammar.js";

function sample() {
  const shared = createNode({ kind: "Leaf", slots: [literal.int(7)] });
  const call = createNode({ kind: "Call", slots: [shared, "puts", shared], extra: 5n });
  return createNode({ kind: "Branch", slots: [call, createNode({ kind: "GlobalVar", slots: [createBinding("$out")] })] });
}

describe("formatGraph", () => {
  it("prints each node once and shared nodes by ordinal", () => {
    expect(formatGraph(sample(), grammar)).toBe(
      [
        "@ Branch",
        "  @ Call",
        "    @ Leaf",
        "      >| VALUE: 7",
        "      >| (NULL)",
        "      >| (NULL)",
        "    >| SYMBOL: :puts",
        "    -> #2 Leaf",
        "  @ GlobalVar",
        "    >| BINDING: :$out",
        "    >| (NULL)",
        "    >| (NULL)",
        "  >| (NULL)",
        "",
      ].join("\n")
    );
  });

  it("shows ordinals and extra words on request", () => {
    const lines = formatGraph(sample(), grammar, { showOffsets: true }).split("\n");
    expect(lines[0]).toBe("@ Branch #0 | extra 0");
    expect(lines[1]).toBe("  @ Call #1 | extra 5");
    expect(lines[3]).toBe("      >| VALUE #0: 7");
    expect(lines[6]).toBe("    >| SYMBOL #0: :puts");
  });

  it("prints identifier groups and args records", () => {
    const root = createNode({
      kind: "Scope",
      slots: [
        createIdentifierGroup(["a", 3]),
        createNode({ kind: "Leaf", slots: [literal.nil()] }),
        createArgsRecord({ preArgsNum: 1, restArg: "r", optArgs: createNode({ kind: "Int", slots: [255n] }) }),
      ],
    });
    expect(formatGraph(root, grammar)).toBe(
      [
        "@ Scope",
        "  >| IDTABLE: [:a, :<3>]",
        "  @ Leaf",
        "    >| VALUE: nil",
        "    >| (NULL)",
        "    >| (NULL)",
        "  >| ARGS: pre=1 post=0 firstPost=- rest=:r block=-",
        "    optArgs:",
        "      @ Int",
        "        >| ff",
        "        >| (NULL)",
        "        >| (NULL)",
        "",
      ].join("\n")
    );
  });

  it("prints empty child slots", () => {
    expect(formatGraph(createNode({ kind: "Branch" }), grammar)).toBe("@ Branch\n  (NULL)\n  (NULL)\n  >| (NULL)\n");
  });

  it("prints cycles without looping", () => {
    const root = createNode({ kind: "Branch" });
    root.slots[0] = root;
    expect(formatGraph(root, grammar)).toBe("@ Branch\n  -> #0 Branch\n  (NULL)\n  >| (NULL)\n");
  });

  it("refuses graphs that do not match the grammar", () => {
    expect(() => formatGraph(createNode({ kind: "Unknown" }), grammar)).toThrow(SchemaError);
  });
});

describe("formatLiteral", () => {
  it("renders literals as source text", () => {
    expect(formatLiteral(literal.float(2))).toBe("2.0");
    expect(formatLiteral(literal.float(0.5))).toBe("0.5");
    expect(formatLiteral(literal.string('a "b"'))).toBe('"a \\"b\\""');
    expect(formatLiteral(literal.int(2n ** 70n))).toBe("1180591620717411303424");
    expect(formatLiteral(literal.bytes(new Uint8Array(3)))).toBe("<3 bytes>");
    expect(formatLiteral(literal.range(literal.int(1), literal.int(10), true))).toBe("1...10");
    expect(formatLiteral(literal.range(literal.int(1), literal.int(10)))).toBe("1..10");
    expect(formatLiteral(literal.array([literal.bool(false), literal.symbol("s")]))).toBe("[false, :s]");
    expect(formatLiteral(literal.hash([[literal.symbol("key"), literal.int(1)]]))).toBe("{:key => 1}");
    expect(formatLiteral(literal.regexp("^a+$", "i"))).toBe("/^a+$/i");
  });
});
