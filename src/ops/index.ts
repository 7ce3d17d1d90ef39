import type {
  ArgsRecord,
  Binding,
  GraphNode,
  IdentifierGroup,
  NodeSlots,
  SlotValue,
  SymbolName,
} from "../types/node.js";
import type { Literal } from "../types/value.js";

/**
 * Input for creating a GraphNode.
 */
export interface CreateNodeInput {
  /** Node kind, as declared in the shape table. */
  kind: string;
  /** Up to three slots; missing ones are empty. */
  slots?: SlotValue[];
  /** Per-node metadata word. Defaults to 0. */
  extra?: bigint | number;
}

/**
 * Creates a GraphNode.
 *
 * @example
 * ```ts
 * const call = createNode({ kind: "Call", slots: [receiver, "puts", args], extra: 12n });
 * ```
 */
export function createNode(input: CreateNodeInput): GraphNode {
  const given = input.slots ?? [];
  if (given.length > 3) {
    throw new RangeError(`a node has 3 slots, got ${given.length}`);
  }
  const slots: NodeSlots = [given[0] ?? null, given[1] ?? null, given[2] ?? null];
  return {
    type: "node",
    kind: input.kind,
    slots,
    extra: BigInt(input.extra ?? 0),
  };
}

/**
 * Input for creating an ArgsRecord. Every field defaults to absent or zero.
 */
export interface CreateArgsRecordInput {
  preInit?: GraphNode | null;
  postInit?: GraphNode | null;
  preArgsNum?: number;
  postArgsNum?: number;
  firstPostArg?: SymbolName | null;
  restArg?: SymbolName | null;
  blockArg?: SymbolName | null;
  kwArgs?: GraphNode | null;
  kwRestArg?: GraphNode | null;
  optArgs?: GraphNode | null;
}

/**
 * Creates an ArgsRecord.
 */
export function createArgsRecord(input: CreateArgsRecordInput = {}): ArgsRecord {
  return {
    type: "argsRecord",
    preInit: input.preInit ?? null,
    postInit: input.postInit ?? null,
    preArgsNum: input.preArgsNum ?? 0,
    postArgsNum: input.postArgsNum ?? 0,
    firstPostArg: input.firstPostArg ?? null,
    restArg: input.restArg ?? null,
    blockArg: input.blockArg ?? null,
    kwArgs: input.kwArgs ?? null,
    kwRestArg: input.kwRestArg ?? null,
    optArgs: input.optArgs ?? null,
  };
}

export function createBinding(name: SymbolName): Binding {
  return { type: "binding", name };
}

export function createIdentifierGroup(names: SymbolName[]): IdentifierGroup {
  return { type: "identifierGroup", names: [...names] };
}

/**
 * Literal constructors. Each call returns a new object, and literals are
 * interned by identity: reuse the returned object to share a table entry.
 */
export const literal = {
  nil(): Literal {
    return { type: "nil" };
  },
  bool(value: boolean): Literal {
    return { type: "bool", value };
  },
  int(value: bigint | number): Literal {
    return { type: "int", value: BigInt(value) };
  },
  float(value: number): Literal {
    return { type: "float", value };
  },
  string(value: string): Literal {
    return { type: "string", value };
  },
  bytes(value: Uint8Array): Literal {
    return { type: "bytes", value };
  },
  symbol(name: string): Literal {
    return { type: "symbol", name };
  },
  range(begin: Literal, end: Literal, exclusive: boolean = false): Literal {
    return { type: "range", begin, end, exclusive };
  },
  array(items: Literal[]): Literal {
    return { type: "array", items };
  },
  hash(entries: Array<[Literal, Literal]>): Literal {
    return { type: "hash", entries };
  },
  regexp(source: string, flags: string = ""): Literal {
    return { type: "regexp", source, flags };
  },
};
