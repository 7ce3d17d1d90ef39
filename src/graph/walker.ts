import { SchemaError } from "../errors.js";
import { assertWordSize, DEFAULT_WORD_SIZE, fitsWord } from "../codec/word.js";
import {
  ARGS_NODE_FIELDS,
  ARGS_SYMBOL_FIELDS,
  isArgsRecord,
  isBinding,
  isGraphNode,
  isIdentifierGroup,
  isSymbolName,
  type ArgsRecord,
  type GraphNode,
  type SlotValue,
} from "../types/node.js";
import { SLOT_COUNT, SlotKind, type ShapeDescriptor } from "../types/slot.js";
import { isLiteral, MAX_LITERAL_DEPTH, type Literal } from "../types/value.js";
import { InternTable, InternTables } from "./intern.js";
import type { ShapeTable } from "./shape.js";

/**
 * A node together with the shape it was walked with.
 */
export interface NodeEntry {
  node: GraphNode;
  shape: ShapeDescriptor;
}

/**
 * Result of one walk: the node table (ordinal = index, root first), the five
 * interning tables, and the kind names in first-seen order.
 */
export interface SerializedForm {
  nodes: NodeEntry[];
  tables: InternTables;
  kinds: InternTable<string>;
}

export interface WalkOptions {
  /** Bytes per raw word; raw slots and `extra` must fit. Defaults to 8. */
  wordSize?: number;
}

interface Frame {
  node: GraphNode;
  parent: GraphNode | undefined;
}

type Fail = (message: string) => SchemaError;

/**
 * Numbers every node reachable from `root` and interns every value it refers to.
 *
 * Nodes are numbered in pre-order (a node gets its ordinal before its
 * children are visited), so shared nodes and cycles are walked once. The walk
 * uses an explicit stack and is not limited by call-stack depth.
 *
 * @throws SchemaError if a node does not conform to its shape
 */
export function walk(root: GraphNode, shapes: ShapeTable, options: WalkOptions = {}): SerializedForm {
  const wordSize = options.wordSize ?? DEFAULT_WORD_SIZE;
  assertWordSize(wordSize);
  if (!isGraphNode(root)) {
    throw new SchemaError("root is not a node");
  }

  const ordinals = new Map<GraphNode, number>();
  const nodes: NodeEntry[] = [];
  const tables = new InternTables();
  const kinds = new InternTable<string>();
  const stack: Frame[] = [{ node: root, parent: undefined }];

  function checkLiteral(literal: Literal, path: string, depth: number, fail: Fail): void {
    if (depth > MAX_LITERAL_DEPTH) {
      throw fail(`${path}: literal nesting exceeds ${MAX_LITERAL_DEPTH} levels`);
    }
    const nested = (child: unknown, where: string): void => {
      if (!isLiteral(child)) {
        throw fail(`${path}.${where} is not a literal`);
      }
      checkLiteral(child, `${path}.${where}`, depth + 1, fail);
    };
    switch (literal.type) {
      case "nil":
        return;
      case "bool":
        if (typeof literal.value !== "boolean") throw fail(`${path}: bool literal needs a boolean`);
        return;
      case "int":
        if (typeof literal.value !== "bigint") throw fail(`${path}: int literal needs a bigint`);
        return;
      case "float":
        if (typeof literal.value !== "number" || Number.isNaN(literal.value)) {
          throw fail(`${path}: float literal needs a non-NaN number`);
        }
        return;
      case "string":
        if (typeof literal.value !== "string") throw fail(`${path}: string literal needs a string`);
        return;
      case "bytes":
        if (!(literal.value instanceof Uint8Array)) throw fail(`${path}: bytes literal needs a Uint8Array`);
        return;
      case "symbol":
        if (typeof literal.name !== "string") throw fail(`${path}: symbol literal needs a name`);
        return;
      case "range":
        nested(literal.begin, "begin");
        nested(literal.end, "end");
        if (typeof literal.exclusive !== "boolean") throw fail(`${path}: range needs an exclusive flag`);
        return;
      case "array":
        if (!Array.isArray(literal.items)) throw fail(`${path}: array literal needs items`);
        literal.items.forEach((item, i) => nested(item, `items[${i}]`));
        return;
      case "hash":
        if (!Array.isArray(literal.entries)) throw fail(`${path}: hash literal needs entries`);
        literal.entries.forEach((entry, i) => {
          if (!Array.isArray(entry) || entry.length !== 2) {
            throw fail(`${path}.entries[${i}] must be a [key, value] pair`);
          }
          nested(entry[0], `entries[${i}][0]`);
          nested(entry[1], `entries[${i}][1]`);
        });
        return;
      case "regexp":
        if (typeof literal.source !== "string" || typeof literal.flags !== "string") {
          throw fail(`${path}: regexp literal needs source and flags`);
        }
        return;
    }
  }

  function visitArgsRecord(record: ArgsRecord, children: GraphNode[], fail: Fail): void {
    for (const field of ARGS_NODE_FIELDS) {
      const ref = record[field];
      if (ref === null) continue;
      if (!isGraphNode(ref)) {
        throw fail(`malformed args record: ${field} is not a node`);
      }
      children.push(ref);
    }
    for (const field of ["preArgsNum", "postArgsNum"] as const) {
      const count = record[field];
      if (!Number.isSafeInteger(count) || count < 0) {
        throw fail(`malformed args record: ${field} must be a non-negative integer`);
      }
    }
    for (const field of ARGS_SYMBOL_FIELDS) {
      const name = record[field];
      if (name === null) continue;
      if (!isSymbolName(name)) {
        throw fail(`malformed args record: ${field} is not a symbol`);
      }
      tables.intern("symbol", name, name);
    }
  }

  function visitSlot(value: SlotValue, kind: SlotKind, slot: number, children: GraphNode[], fail: Fail): void {
    if (value === null) {
      return;
    }
    switch (kind) {
      case SlotKind.None:
        throw fail(`slot ${slot} must be empty`);

      case SlotKind.RawLong:
        if (typeof value !== "bigint" || !fitsWord(value, wordSize)) {
          throw fail(`slot ${slot} must hold an unsigned ${wordSize}-byte word`);
        }
        return;

      case SlotKind.ChildNode:
        if (!isGraphNode(value)) {
          throw fail(`child slot ${slot} is not a node`);
        }
        children.push(value);
        return;

      case SlotKind.Value:
        if (isGraphNode(value)) {
          throw fail(`node instead of value in slot ${slot}`);
        }
        if (!isLiteral(value)) {
          throw fail(`slot ${slot} does not hold a literal`);
        }
        if (!tables.table("value").has(value)) {
          checkLiteral(value, `slot ${slot}`, 0, fail);
        }
        tables.intern("value", value, value);
        return;

      case SlotKind.Symbol:
        if (!isSymbolName(value)) {
          throw fail(`slot ${slot} does not hold a symbol`);
        }
        tables.intern("symbol", value, value);
        return;

      case SlotKind.IdentifierGroup:
        if (!isIdentifierGroup(value) || !Array.isArray(value.names)) {
          throw fail(`slot ${slot} does not hold an identifier group`);
        }
        if (!tables.table("identifierGroup").has(value)) {
          for (const name of value.names) {
            if (!isSymbolName(name)) {
              throw fail(`identifier group in slot ${slot} contains a non-symbol`);
            }
            tables.intern("symbol", name, name);
          }
        }
        tables.intern("identifierGroup", value, value);
        return;

      case SlotKind.ArgsRecord:
        if (!isArgsRecord(value)) {
          throw fail(`slot ${slot} does not hold an args record`);
        }
        if (!tables.table("argsRecord").has(value)) {
          visitArgsRecord(value, children, fail);
        }
        tables.intern("argsRecord", value, value);
        return;

      case SlotKind.Binding:
        if (!isBinding(value) || !isSymbolName(value.name)) {
          throw fail(`slot ${slot} does not hold a binding`);
        }
        tables.intern("symbol", value.name, value.name);
        tables.intern("binding", value, value);
        return;
    }
  }

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const { node, parent } = frame;
    if (ordinals.has(node)) {
      continue;
    }

    const index = nodes.length;
    const kind = node.kind;
    const fail: Fail = (message) => new SchemaError(`node ${index} (${kind}): ${message}`, kind, index);

    if (!shapes.has(kind)) {
      throw fail("no shape declared for this kind");
    }
    if (!Array.isArray(node.slots) || node.slots.length !== SLOT_COUNT) {
      throw fail(`a node has exactly ${SLOT_COUNT} slots`);
    }
    if (typeof node.extra !== "bigint" || !fitsWord(node.extra, wordSize)) {
      throw fail(`extra must be an unsigned ${wordSize}-byte word`);
    }
    let shape: ShapeDescriptor;
    try {
      shape = shapes.resolve(node, parent);
    } catch (error) {
      if (error instanceof SchemaError) {
        throw fail(error.message.replace(/^\[E003\] /, ""));
      }
      throw error;
    }

    ordinals.set(node, index);
    nodes.push({ node, shape });
    kinds.intern(kind, kind);

    const children: GraphNode[] = [];
    for (let slot = 0; slot < SLOT_COUNT; slot++) {
      visitSlot(node.slots[slot], shape[slot], slot, children, fail);
    }
    // Reverse push: slot 0's subtree is numbered first.
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ node: children[i], parent: node });
    }
  }

  return { nodes, tables, kinds };
}
