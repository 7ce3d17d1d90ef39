import { CorruptionError, SchemaError } from "../errors.js";
import type { NodeEntry } from "../graph/walker.js";
import type { Category, CategoryKey } from "../graph/intern.js";
import {
  isArgsRecord,
  isBinding,
  isGraphNode,
  isIdentifierGroup,
  isSymbolName,
  type ArgsRecord,
  type Binding,
  type GraphNode,
  type IdentifierGroup,
  type NodeSlots,
  type SlotValue,
  type SymbolName,
} from "../types/node.js";
import { isSlotTag, SLOT_COUNT, SlotKind, SlotTag } from "../types/slot.js";
import { isLiteral, type Literal } from "../types/value.js";
import { Reader, Writer } from "./primitives.js";
import { encodeWord, fitsWord } from "./word.js";

/** Fixed bytes in front of every node record. */
export const NODE_HEADER_SIZE = 4;

/**
 * Ordinal lookups used while writing the node stream.
 */
export interface NodeStreamIndices {
  getNodeIndex(node: GraphNode): number;
  getKindIndex(kind: string): number;
  getCategoryIndex<C extends Category>(category: C, key: CategoryKey<C>): number;
}

/**
 * Ordinal lookups used while reading the node stream. Each throws a
 * CorruptionError (E002) when the ordinal is out of range; `offset` is the
 * position of the offending payload.
 */
export interface NodeStreamLookups {
  getKind(index: number, offset: number): string;
  getNode(index: number, offset: number): GraphNode;
  getValue(index: number, offset: number): Literal;
  getSymbol(index: number, offset: number): SymbolName;
  getIdentifierGroup(index: number, offset: number): IdentifierGroup;
  getArgsRecord(index: number, offset: number): ArgsRecord;
  getBinding(index: number, offset: number): Binding;
}

/**
 * A node record read back from the stream.
 */
export interface DecodedNode {
  kind: string;
  extra: bigint;
  slots: NodeSlots;
  tags: [SlotTag, SlotTag, SlotTag];
  /** Offset of the record header. */
  offset: number;
}

interface EncodedSlot {
  tag: SlotTag;
  payload: Uint8Array;
}

const EMPTY_SLOT: EncodedSlot = { tag: SlotTag.None, payload: new Uint8Array(0) };

function ordinalWord(ordinal: number, wordSize: number, what: string): Uint8Array {
  const word = BigInt(ordinal);
  if (!fitsWord(word, wordSize)) {
    throw new SchemaError(`${what} ordinal ${ordinal} does not fit a ${wordSize}-byte word`);
  }
  return encodeWord(word, wordSize);
}

function encodeSlot(
  value: SlotValue,
  kind: SlotKind,
  dicts: NodeStreamIndices,
  wordSize: number,
  fail: (message: string) => SchemaError
): EncodedSlot {
  if (value === null) {
    return EMPTY_SLOT;
  }
  switch (kind) {
    case SlotKind.None:
      throw fail("non-empty slot declared as None");
    case SlotKind.RawLong:
      if (typeof value !== "bigint" || !fitsWord(value, wordSize)) {
        throw fail("raw slot does not hold a word");
      }
      return { tag: SlotTag.Raw, payload: encodeWord(value, wordSize) };
    case SlotKind.ChildNode:
      if (!isGraphNode(value)) {
        throw fail("child slot does not hold a node");
      }
      return { tag: SlotTag.Node, payload: ordinalWord(dicts.getNodeIndex(value), wordSize, "node") };
    case SlotKind.Value:
      if (isGraphNode(value) || !isLiteral(value)) {
        throw fail("value slot does not hold a literal");
      }
      return { tag: SlotTag.Value, payload: ordinalWord(dicts.getCategoryIndex("value", value), wordSize, "value") };
    case SlotKind.Symbol:
      if (!isSymbolName(value)) {
        throw fail("symbol slot does not hold a symbol");
      }
      return { tag: SlotTag.Symbol, payload: ordinalWord(dicts.getCategoryIndex("symbol", value), wordSize, "symbol") };
    case SlotKind.IdentifierGroup:
      if (!isIdentifierGroup(value)) {
        throw fail("identifier group slot does not hold an identifier group");
      }
      return {
        tag: SlotTag.IdentifierGroup,
        payload: ordinalWord(dicts.getCategoryIndex("identifierGroup", value), wordSize, "identifier group"),
      };
    case SlotKind.ArgsRecord:
      if (!isArgsRecord(value)) {
        throw fail("args slot does not hold an args record");
      }
      return {
        tag: SlotTag.ArgsRecord,
        payload: ordinalWord(dicts.getCategoryIndex("argsRecord", value), wordSize, "args record"),
      };
    case SlotKind.Binding:
      if (!isBinding(value)) {
        throw fail("binding slot does not hold a binding");
      }
      return {
        tag: SlotTag.Binding,
        payload: ordinalWord(dicts.getCategoryIndex("binding", value), wordSize, "binding"),
      };
  }
}

/**
 * Writes one node record: the 4-byte header, then the kind ordinal, the extra
 * word and the slot payloads.
 *
 * Header bytes 0..2 hold one tag per slot (low nibble SlotTag, high nibble
 * payload length); byte 3 holds the kind ordinal length (high nibble) and the
 * extra word length (low nibble).
 */
export function encodeNodeRecord(
  writer: Writer,
  entry: NodeEntry,
  dicts: NodeStreamIndices,
  wordSize: number
): void {
  const { node, shape } = entry;
  const index = dicts.getNodeIndex(node);
  const fail = (message: string): SchemaError =>
    new SchemaError(`node ${index} (${node.kind}): ${message}`, node.kind, index);

  const kindBytes = ordinalWord(dicts.getKindIndex(node.kind), wordSize, "kind");
  if (!fitsWord(node.extra, wordSize)) {
    throw fail(`extra does not fit a ${wordSize}-byte word`);
  }
  const extraBytes = encodeWord(node.extra, wordSize);
  const slots: EncodedSlot[] = [];
  for (let i = 0; i < SLOT_COUNT; i++) {
    slots.push(encodeSlot(node.slots[i], shape[i], dicts, wordSize, fail));
  }

  for (const slot of slots) {
    writer.writeByte((slot.payload.length << 4) | slot.tag);
  }
  writer.writeByte((kindBytes.length << 4) | extraBytes.length);
  writer.writeBytes(kindBytes);
  writer.writeBytes(extraBytes);
  for (const slot of slots) {
    writer.writeBytes(slot.payload);
  }
}

function toIndex(word: bigint): number {
  return Number(word);
}

function decodeSlot(tag: SlotTag, word: bigint, offset: number, dicts: NodeStreamLookups): SlotValue {
  switch (tag) {
    case SlotTag.None:
      return null;
    case SlotTag.Raw:
      return word;
    case SlotTag.Node:
      return dicts.getNode(toIndex(word), offset);
    case SlotTag.Value:
      return dicts.getValue(toIndex(word), offset);
    case SlotTag.Symbol:
      return dicts.getSymbol(toIndex(word), offset);
    case SlotTag.IdentifierGroup:
      return dicts.getIdentifierGroup(toIndex(word), offset);
    case SlotTag.ArgsRecord:
      return dicts.getArgsRecord(toIndex(word), offset);
    case SlotTag.Binding:
      return dicts.getBinding(toIndex(word), offset);
  }
}

/**
 * Reads one node record, resolving every ordinal through `dicts`.
 */
export function decodeNodeRecord(reader: Reader, dicts: NodeStreamLookups, wordSize: number): DecodedNode {
  const offset = reader.position();
  const tags: SlotTag[] = [];
  const lengths: number[] = [];
  for (let i = 0; i < SLOT_COUNT; i++) {
    const byte = reader.readByte();
    const tag = byte & 0x0f;
    const length = byte >> 4;
    if (!isSlotTag(tag)) {
      throw new CorruptionError("E004", `unknown slot tag ${tag} in slot ${i}`, reader.position() - 1);
    }
    if (tag === SlotTag.None && length !== 0) {
      throw new CorruptionError("E004", `empty slot ${i} carries a ${length}-byte payload`, reader.position() - 1);
    }
    tags.push(tag);
    lengths.push(length);
  }
  const sizes = reader.readByte();

  const kindOffset = reader.position();
  const kind = dicts.getKind(toIndex(reader.readWord(sizes >> 4, wordSize)), kindOffset);
  const extra = reader.readWord(sizes & 0x0f, wordSize);

  const values: SlotValue[] = [];
  for (let i = 0; i < SLOT_COUNT; i++) {
    const payloadOffset = reader.position();
    const word = reader.readWord(lengths[i], wordSize);
    values.push(decodeSlot(tags[i], word, payloadOffset, dicts));
  }

  return {
    kind,
    extra,
    slots: [values[0], values[1], values[2]],
    tags: [tags[0], tags[1], tags[2]],
    offset,
  };
}
