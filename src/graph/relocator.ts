import { CorruptionError } from "../errors.js";
import { readContainer } from "../codec/container.js";
import { decodeNodeRecord, type DecodedNode, type NodeStreamLookups } from "../codec/nodes.js";
import { Reader } from "../codec/primitives.js";
import type { ContainerInfo, MarshalEnvironment, WireArgsRecord, WireTables } from "../types/container.js";
import type { ArgsRecord, Binding, GraphNode, IdentifierGroup, SymbolName } from "../types/node.js";
import { SLOT_COUNT, slotKindName, SlotTag, slotTagFor } from "../types/slot.js";
import type { Literal } from "../types/value.js";
import { resolveEnvironment } from "../util/env.js";
import type { ShapeTable } from "./shape.js";

/**
 * Options for decoding.
 */
export interface DecodeOptions {
  /** Expected tags; missing fields come from defaultEnvironment(). */
  environment?: Partial<MarshalEnvironment>;
  /** When given, node kinds and slot tags are checked against it. */
  shapes?: ShapeTable;
  /** Creates the placeholder for one node. Called exactly once per node. */
  allocateNode?: () => GraphNode;
  /** Resolves a binding by name. Called once per distinct name. */
  resolveBinding?: (name: SymbolName) => Binding;
}

/**
 * A reconstructed graph with everything the container carried.
 */
export interface LoadedGraph {
  root: GraphNode;
  /** Node table, ordinal = index. */
  nodes: GraphNode[];
  nodeCount: number;
  symbols: SymbolName[];
  values: Literal[];
  info: ContainerInfo;
  platform: string;
  version: string;
}

export type RelocatorState =
  | { phase: "empty" }
  | { phase: "allocated" }
  | { phase: "resolving"; index: number }
  | { phase: "resolved" }
  | { phase: "failed"; error: unknown };

export type RelocatorPhase = RelocatorState["phase"];

function emptyNode(): GraphNode {
  return { type: "node", kind: "", slots: [null, null, null], extra: 0n };
}

function lookup<T>(table: readonly T[], what: string, index: number, offset: number): T {
  if (index >= table.length) {
    throw new CorruptionError("E002", `${what} index ${index} out of bounds (size: ${table.length})`, offset);
  }
  return table[index];
}

/**
 * Two-pass loader.
 *
 * `allocate()` checks compatibility, reads every table and creates one
 * placeholder per node. `resolve()` then fills the placeholders in ordinal
 * order; a node may refer to any placeholder, including later ones. A relocator
 * is used once: phases only move forward, and a failure leaves it in the
 * `failed` phase with its arena dropped.
 */
export class Relocator {
  private state: RelocatorState = { phase: "empty" };
  private readonly environment: MarshalEnvironment;
  private wire: WireTables | undefined;
  private arena: GraphNode[] = [];
  private identifierGroups: IdentifierGroup[] = [];
  private argsRecords: ArgsRecord[] = [];
  private bindings: Binding[] = [];

  constructor(
    private readonly data: Uint8Array,
    private readonly options: DecodeOptions = {}
  ) {
    this.environment = resolveEnvironment(options.environment);
  }

  get phase(): RelocatorPhase {
    return this.state.phase;
  }

  get current(): RelocatorState {
    return this.state;
  }

  private expect(phase: RelocatorPhase): void {
    if (this.state.phase !== phase) {
      throw new Error(`relocator is ${this.state.phase}, expected ${phase}`);
    }
  }

  private fail(error: unknown): void {
    this.state = { phase: "failed", error };
    this.arena = [];
    this.identifierGroups = [];
    this.argsRecords = [];
    this.bindings = [];
    this.wire = undefined;
  }

  private tables(): WireTables {
    if (this.wire === undefined) {
      throw new Error(`relocator is ${this.state.phase}, tables are not loaded`);
    }
    return this.wire;
  }

  /**
   * Pass 1: compatibility gate, tables, placeholders.
   */
  allocate(): void {
    this.expect("empty");
    try {
      const wire = readContainer(this.data, this.environment);
      this.wire = wire;

      this.identifierGroups = wire.identifierGroups.map((names) => ({
        type: "identifierGroup",
        names: names.map((ordinal) => wire.symbols[ordinal]),
      }));
      this.bindings = this.materializeBindings(wire);

      const allocateNode = this.options.allocateNode ?? emptyNode;
      for (let i = 0; i < wire.nodeCount; i++) {
        this.arena.push(allocateNode());
      }
      this.argsRecords = wire.argsRecords.map((args) => this.linkArgsRecord(args, wire));

      this.state = { phase: "allocated" };
    } catch (error) {
      this.fail(error);
      throw error;
    }
  }

  /**
   * Pass 2: fills every placeholder and returns the root.
   */
  resolve(): GraphNode {
    this.expect("allocated");
    try {
      const wire = this.tables();
      const reader = new Reader(wire.nodeStream, wire.nodeStreamOffset);
      const lookups = this.lookups(wire);

      for (let i = 0; i < wire.nodeCount; i++) {
        this.state = { phase: "resolving", index: i };
        const record = decodeNodeRecord(reader, lookups, this.environment.wordSize);
        this.checkShape(record);
        const node = this.arena[i];
        node.type = "node";
        node.kind = record.kind;
        node.extra = record.extra;
        node.slots = record.slots;
      }
      if (reader.hasMore()) {
        throw new CorruptionError("E004", `${reader.remaining()} trailing bytes in the node stream`, reader.position());
      }

      this.state = { phase: "resolved" };
      return this.arena[0];
    } catch (error) {
      this.fail(error);
      throw error;
    }
  }

  /**
   * Everything loaded; only available once resolved.
   */
  result(): LoadedGraph {
    this.expect("resolved");
    const wire = this.tables();
    return {
      root: this.arena[0],
      nodes: this.arena,
      nodeCount: wire.nodeCount,
      symbols: wire.symbols,
      values: wire.values,
      info: wire.info,
      platform: wire.platform,
      version: wire.version,
    };
  }

  private materializeBindings(wire: WireTables): Binding[] {
    const resolveBinding = this.options.resolveBinding ?? ((name: SymbolName): Binding => ({ type: "binding", name }));
    const byName = new Map<SymbolName, Binding>();
    return wire.bindings.map((ordinal) => {
      const name = wire.symbols[ordinal];
      let binding = byName.get(name);
      if (binding === undefined) {
        binding = resolveBinding(name);
        byName.set(name, binding);
      }
      return binding;
    });
  }

  private linkArgsRecord(args: WireArgsRecord, wire: WireTables): ArgsRecord {
    const node = (ordinal: number | undefined): GraphNode | null =>
      ordinal === undefined ? null : this.arena[ordinal];
    const symbol = (ordinal: number | undefined): SymbolName | null =>
      ordinal === undefined ? null : wire.symbols[ordinal];
    return {
      type: "argsRecord",
      preInit: node(args.preInit),
      postInit: node(args.postInit),
      preArgsNum: args.preArgsNum,
      postArgsNum: args.postArgsNum,
      firstPostArg: symbol(args.firstPostArg),
      restArg: symbol(args.restArg),
      blockArg: symbol(args.blockArg),
      kwArgs: node(args.kwArgs),
      kwRestArg: node(args.kwRestArg),
      optArgs: node(args.optArgs),
    };
  }

  private lookups(wire: WireTables): NodeStreamLookups {
    return {
      getKind: (index, offset) => lookup(wire.kinds, "kind", index, offset),
      getNode: (index, offset) => lookup(this.arena, "node", index, offset),
      getValue: (index, offset) => lookup(wire.values, "value", index, offset),
      getSymbol: (index, offset) => lookup(wire.symbols, "symbol", index, offset),
      getIdentifierGroup: (index, offset) => lookup(this.identifierGroups, "identifier group", index, offset),
      getArgsRecord: (index, offset) => lookup(this.argsRecords, "args record", index, offset),
      getBinding: (index, offset) => lookup(this.bindings, "binding", index, offset),
    };
  }

  private checkShape(record: DecodedNode): void {
    const shapes = this.options.shapes;
    if (shapes === undefined) {
      return;
    }
    if (!shapes.has(record.kind)) {
      throw new CorruptionError("E004", `unknown node kind ${record.kind}`, record.offset);
    }
    // Overridden kinds may use any shape the override can produce.
    if (shapes.hasOverride(record.kind)) {
      return;
    }
    const shape = shapes.shapeOf(record.kind);
    for (let i = 0; i < SLOT_COUNT; i++) {
      const tag = record.tags[i];
      if (tag !== SlotTag.None && tag !== slotTagFor(shape[i])) {
        throw new CorruptionError(
          "E004",
          `slot ${i} of ${record.kind} holds ${SlotTag[tag]}, declared ${slotKindName(shape[i])}`,
          record.offset + i
        );
      }
    }
  }
}

/**
 * Decodes a container and returns the root node.
 *
 * @throws CompatibilityError before anything is allocated when the container
 * was written by another environment
 * @throws CorruptionError when the container is damaged
 */
export function reconstruct(data: Uint8Array, options: DecodeOptions = {}): GraphNode {
  return load(data, options).root;
}

/**
 * Decodes a container and returns the root with the tables it carried.
 */
export function load(data: Uint8Array, options: DecodeOptions = {}): LoadedGraph {
  const relocator = new Relocator(data, options);
  relocator.allocate();
  relocator.resolve();
  return relocator.result();
}
