import type { Literal } from "./value.js";

/**
 * Name of an interned identifier. Identifiers without a textual name are
 * carried as non-negative integers.
 */
export type SymbolName = string | number;

/**
 * A fixed-arity graph element.
 *
 * Identity is by reference: the same object reached through several slots is
 * one node, two equal-looking objects are two nodes.
 */
export interface GraphNode {
  type: "node";
  /** Node kind, looked up in the shape table. */
  kind: string;
  /** Exactly three slots, interpreted through the kind's shape. */
  slots: NodeSlots;
  /** Per-node metadata word (source line, flags). */
  extra: bigint;
}

export type NodeSlots = [SlotValue, SlotValue, SlotValue];

/**
 * An ordered group of identifiers (e.g. the local variable table of a scope).
 */
export interface IdentifierGroup {
  type: "identifierGroup";
  names: SymbolName[];
}

/**
 * Arguments description attached to a parameterized scope.
 */
export interface ArgsRecord {
  type: "argsRecord";
  preInit: GraphNode | null;
  postInit: GraphNode | null;
  preArgsNum: number;
  postArgsNum: number;
  firstPostArg: SymbolName | null;
  restArg: SymbolName | null;
  blockArg: SymbolName | null;
  kwArgs: GraphNode | null;
  kwRestArg: GraphNode | null;
  optArgs: GraphNode | null;
}

/** Node-valued fields of an ArgsRecord, in wire order. */
export const ARGS_NODE_FIELDS = ["preInit", "postInit", "kwArgs", "kwRestArg", "optArgs"] as const;

/** Symbol-valued fields of an ArgsRecord, in wire order. */
export const ARGS_SYMBOL_FIELDS = ["firstPostArg", "restArg", "blockArg"] as const;

export type ArgsNodeField = (typeof ARGS_NODE_FIELDS)[number];
export type ArgsSymbolField = (typeof ARGS_SYMBOL_FIELDS)[number];

/**
 * Handle to an externally resolved entity (e.g. a process-global variable),
 * identified by its symbol.
 */
export interface Binding {
  type: "binding";
  name: SymbolName;
}

/**
 * Anything a slot can hold. `null` is an empty slot and `bigint` a raw word.
 */
export type SlotValue =
  | null
  | bigint
  | SymbolName
  | GraphNode
  | Literal
  | IdentifierGroup
  | ArgsRecord
  | Binding;

function hasType(value: unknown, type: string): boolean {
  return typeof value === "object" && value !== null && "type" in value && value.type === type;
}

export function isGraphNode(value: unknown): value is GraphNode {
  return hasType(value, "node");
}

export function isIdentifierGroup(value: unknown): value is IdentifierGroup {
  return hasType(value, "identifierGroup");
}

export function isArgsRecord(value: unknown): value is ArgsRecord {
  return hasType(value, "argsRecord");
}

export function isBinding(value: unknown): value is Binding {
  return hasType(value, "binding");
}

export function isSymbolName(value: unknown): value is SymbolName {
  return typeof value === "string" || (typeof value === "number" && Number.isSafeInteger(value) && value >= 0);
}
