import { CompatibilityError, CorruptionError, SchemaError } from "../errors.js";
import type { ShapeTable } from "../graph/shape.js";
import { walk, type SerializedForm } from "../graph/walker.js";
import type { Category, CategoryKey } from "../graph/intern.js";
import {
  createWireTables,
  type ContainerInfo,
  type MarshalEnvironment,
  type WireArgsRecord,
  type WireTables,
} from "../types/container.js";
import type { GraphNode, SymbolName } from "../types/node.js";
import { resolveEnvironment } from "../util/env.js";
import { encodeNodeRecord, NODE_HEADER_SIZE, type NodeStreamIndices } from "./nodes.js";
import { MAX_DICT_SIZE, MAX_STRING_LEN, Reader, Writer } from "./primitives.js";
import { decodeLiteral, encodeLiteral } from "./value.js";

const MAGIC_TEXT = "IRGRAPH1";
const MAGIC = new TextEncoder().encode(MAGIC_TEXT);

const SYMBOL_STRING = 0x00;
const SYMBOL_INTEGER = 0x01;

/**
 * Options for encoding.
 */
export interface EncodeOptions {
  /** Tags written into the container; missing fields come from defaultEnvironment(). */
  environment?: Partial<MarshalEnvironment>;
  /** Descriptive strings carried through unchanged. */
  info?: ContainerInfo;
}

export interface SerializeOptions extends EncodeOptions {
  shapes: ShapeTable;
}

function checkTableSize(what: string, size: number): void {
  if (size > MAX_DICT_SIZE) {
    throw new SchemaError(`${what} table size ${size} exceeds maximum ${MAX_DICT_SIZE}`);
  }
}

function checkStringLength(what: string, s: string | undefined): void {
  if (s !== undefined && new TextEncoder().encode(s).length > MAX_STRING_LEN) {
    throw new SchemaError(`${what} exceeds maximum length ${MAX_STRING_LEN}`);
  }
}

/**
 * Walks `root` and encodes the result.
 */
export function serialize(root: GraphNode, options: SerializeOptions): Uint8Array {
  const environment = resolveEnvironment(options.environment);
  const form = walk(root, options.shapes, { wordSize: environment.wordSize });
  return encodeGraph(form, { environment, info: options.info });
}

/**
 * Encodes a walked graph to a container.
 */
export function encodeGraph(form: SerializedForm, options: EncodeOptions = {}): Uint8Array {
  const environment = resolveEnvironment(options.environment);
  const info = options.info ?? {};
  const { nodes, tables, kinds } = form;

  if (nodes.length === 0) {
    throw new SchemaError("node table is empty");
  }
  checkTableSize("node", nodes.length);
  checkTableSize("kind", kinds.size);
  checkTableSize("value", tables.size("value"));
  checkTableSize("symbol", tables.size("symbol"));
  checkTableSize("identifier group", tables.size("identifierGroup"));
  checkTableSize("args record", tables.size("argsRecord"));
  checkTableSize("binding", tables.size("binding"));
  checkStringLength("platform tag", environment.platform);
  checkStringLength("version tag", environment.version);
  checkStringLength("name", info.name);
  checkStringLength("origin label", info.originLabel);
  checkStringLength("origin path", info.originPath);
  for (const kind of kinds.payloadsInOrder()) {
    checkStringLength("kind name", kind);
  }
  for (const group of tables.payloadsInOrder("identifierGroup")) {
    checkTableSize("identifier group name", group.names.length);
  }

  const nodeIndices = new Map<GraphNode, number>();
  nodes.forEach((entry, i) => nodeIndices.set(entry.node, i));

  const indices: NodeStreamIndices = {
    getNodeIndex(node: GraphNode): number {
      const index = nodeIndices.get(node);
      if (index === undefined) {
        throw new SchemaError(`node of kind ${node.kind} is not in the node table`, node.kind);
      }
      return index;
    },
    getKindIndex(kind: string): number {
      const index = kinds.ordinalOf(kind);
      if (index === undefined) {
        throw new SchemaError(`kind ${kind} is not in the kind table`, kind);
      }
      return index;
    },
    getCategoryIndex<C extends Category>(category: C, key: CategoryKey<C>): number {
      const index = tables.ordinalOf(category, key);
      if (index === undefined) {
        throw new SchemaError(`${category} referenced by a node was never interned`);
      }
      return index;
    },
  };

  // Node stream first, so every reference is checked before the header is written
  const streamWriter = new Writer(nodes.length * 8);
  for (const entry of nodes) {
    encodeNodeRecord(streamWriter, entry, indices, environment.wordSize);
  }
  const streamBytes = streamWriter.finish();

  const nodeRef = (node: GraphNode | null): number => (node === null ? 0 : indices.getNodeIndex(node) + 1);
  const symbolRef = (name: SymbolName | null): number =>
    name === null ? 0 : indices.getCategoryIndex("symbol", name) + 1;

  const writer = new Writer(streamBytes.length + 256);

  writer.writeBytes(MAGIC);
  writer.writeString(environment.platform);
  writer.writeString(environment.version);
  writer.writeOptionalString(info.name);
  writer.writeOptionalString(info.originLabel);
  writer.writeOptionalString(info.originPath);
  writer.writeVarintNumber(nodes.length);

  writer.writeVarintNumber(kinds.size);
  for (const kind of kinds.payloadsInOrder()) {
    writer.writeString(kind);
  }

  const symbols = tables.payloadsInOrder("symbol");
  writer.writeVarintNumber(symbols.length);
  for (const symbol of symbols) {
    if (typeof symbol === "string") {
      checkStringLength("symbol name", symbol);
      writer.writeByte(SYMBOL_STRING);
      writer.writeString(symbol);
    } else {
      writer.writeByte(SYMBOL_INTEGER);
      writer.writeVarintNumber(symbol);
    }
  }

  const values = tables.payloadsInOrder("value");
  writer.writeVarintNumber(values.length);
  for (const value of values) {
    encodeLiteral(writer, value);
  }

  const groups = tables.payloadsInOrder("identifierGroup");
  writer.writeVarintNumber(groups.length);
  for (const group of groups) {
    writer.writeVarintNumber(group.names.length);
    for (const name of group.names) {
      writer.writeVarintNumber(indices.getCategoryIndex("symbol", name));
    }
  }

  const argsRecords = tables.payloadsInOrder("argsRecord");
  writer.writeVarintNumber(argsRecords.length);
  for (const args of argsRecords) {
    writer.writeVarintNumber(nodeRef(args.preInit));
    writer.writeVarintNumber(nodeRef(args.postInit));
    writer.writeVarintNumber(args.preArgsNum);
    writer.writeVarintNumber(args.postArgsNum);
    writer.writeVarintNumber(symbolRef(args.firstPostArg));
    writer.writeVarintNumber(symbolRef(args.restArg));
    writer.writeVarintNumber(symbolRef(args.blockArg));
    writer.writeVarintNumber(nodeRef(args.kwArgs));
    writer.writeVarintNumber(nodeRef(args.kwRestArg));
    writer.writeVarintNumber(nodeRef(args.optArgs));
  }

  const bindings = tables.payloadsInOrder("binding");
  writer.writeVarintNumber(bindings.length);
  for (const binding of bindings) {
    writer.writeVarintNumber(indices.getCategoryIndex("symbol", binding.name));
  }

  writer.writeLengthPrefixedBytes(streamBytes);

  return writer.finish();
}

function matchesMagic(data: Uint8Array): boolean {
  if (data.length < MAGIC.length) {
    return false;
  }
  for (let i = 0; i < MAGIC.length; i++) {
    if (data[i] !== MAGIC[i]) {
      return false;
    }
  }
  return true;
}

function readTableSize(reader: Reader, what: string, minEntryBytes: number): number {
  const offset = reader.position();
  const size = reader.readVarintNumber();
  if (size > MAX_DICT_SIZE) {
    throw new CorruptionError("E005", `${what} table size ${size} exceeds maximum ${MAX_DICT_SIZE}`, offset);
  }
  if (size * minEntryBytes > reader.remaining()) {
    throw new CorruptionError("E005", `${what} table of ${size} entries overruns the input`, offset);
  }
  return size;
}

function readOrdinal(reader: Reader, what: string, size: number): number {
  const offset = reader.position();
  const ordinal = reader.readVarintNumber();
  if (ordinal >= size) {
    throw new CorruptionError("E002", `${what} index ${ordinal} out of bounds (size: ${size})`, offset);
  }
  return ordinal;
}

function readOptionalRef(reader: Reader, what: string, size: number): number | undefined {
  const offset = reader.position();
  const ref = reader.readVarintNumber();
  if (ref === 0) {
    return undefined;
  }
  if (ref > size) {
    throw new CorruptionError("E002", `${what} index ${ref - 1} out of bounds (size: ${size})`, offset);
  }
  return ref - 1;
}

/**
 * Checks the container against `environment` and reads every table; node
 * records stay undecoded in `nodeStream`.
 *
 * @throws CompatibilityError on a magic, platform or version mismatch
 * @throws CorruptionError when the tables are damaged
 */
export function readContainer(data: Uint8Array, environment: MarshalEnvironment): WireTables {
  if (!matchesMagic(data)) {
    const found = String.fromCharCode(...data.subarray(0, MAGIC.length));
    throw new CompatibilityError("not a graph container", MAGIC_TEXT, found);
  }

  const reader = new Reader(data);
  reader.readBytes(MAGIC.length);
  const wire = createWireTables();

  wire.platform = reader.readString(MAX_STRING_LEN);
  if (wire.platform !== environment.platform) {
    throw new CompatibilityError("platform tag mismatch", environment.platform, wire.platform);
  }
  wire.version = reader.readString(MAX_STRING_LEN);
  if (wire.version !== environment.version) {
    throw new CompatibilityError("version tag mismatch", environment.version, wire.version);
  }

  const name = reader.readOptionalString(MAX_STRING_LEN);
  const originLabel = reader.readOptionalString(MAX_STRING_LEN);
  const originPath = reader.readOptionalString(MAX_STRING_LEN);
  if (name !== undefined) wire.info.name = name;
  if (originLabel !== undefined) wire.info.originLabel = originLabel;
  if (originPath !== undefined) wire.info.originPath = originPath;

  const countOffset = reader.position();
  wire.nodeCount = reader.readVarintNumber();
  if (wire.nodeCount === 0) {
    throw new CorruptionError("E004", "container holds no nodes", countOffset);
  }
  if (wire.nodeCount > MAX_DICT_SIZE) {
    throw new CorruptionError("E005", `node count ${wire.nodeCount} exceeds maximum ${MAX_DICT_SIZE}`, countOffset);
  }

  const kindCount = readTableSize(reader, "kind", 1);
  for (let i = 0; i < kindCount; i++) {
    wire.kinds.push(reader.readString(MAX_STRING_LEN));
  }

  const symbolCount = readTableSize(reader, "symbol", 2);
  for (let i = 0; i < symbolCount; i++) {
    const tagOffset = reader.position();
    const tag = reader.readByte();
    if (tag === SYMBOL_STRING) {
      wire.symbols.push(reader.readString(MAX_STRING_LEN));
    } else if (tag === SYMBOL_INTEGER) {
      wire.symbols.push(reader.readVarintNumber());
    } else {
      throw new CorruptionError("E004", `invalid symbol tag: ${tag}`, tagOffset);
    }
  }

  const valueCount = readTableSize(reader, "value", 1);
  for (let i = 0; i < valueCount; i++) {
    wire.values.push(decodeLiteral(reader));
  }

  const groupCount = readTableSize(reader, "identifier group", 1);
  for (let i = 0; i < groupCount; i++) {
    const nameCount = readTableSize(reader, "identifier group name", 1);
    const names: number[] = [];
    for (let j = 0; j < nameCount; j++) {
      names.push(readOrdinal(reader, "symbol", wire.symbols.length));
    }
    wire.identifierGroups.push(names);
  }

  const argsCount = readTableSize(reader, "args record", 10);
  for (let i = 0; i < argsCount; i++) {
    const symbols = wire.symbols.length;
    const nodes = wire.nodeCount;
    const args: WireArgsRecord = {
      preInit: readOptionalRef(reader, "node", nodes),
      postInit: readOptionalRef(reader, "node", nodes),
      preArgsNum: reader.readVarintNumber(),
      postArgsNum: reader.readVarintNumber(),
      firstPostArg: readOptionalRef(reader, "symbol", symbols),
      restArg: readOptionalRef(reader, "symbol", symbols),
      blockArg: readOptionalRef(reader, "symbol", symbols),
      kwArgs: readOptionalRef(reader, "node", nodes),
      kwRestArg: readOptionalRef(reader, "node", nodes),
      optArgs: readOptionalRef(reader, "node", nodes),
    };
    wire.argsRecords.push(args);
  }

  const bindingCount = readTableSize(reader, "binding", 1);
  for (let i = 0; i < bindingCount; i++) {
    wire.bindings.push(readOrdinal(reader, "symbol", wire.symbols.length));
  }

  const streamLength = reader.readVarintNumber();
  wire.nodeStreamOffset = reader.position();
  wire.nodeStream = reader.readBytes(streamLength);
  if (wire.nodeCount * NODE_HEADER_SIZE > streamLength) {
    throw new CorruptionError(
      "E005",
      `node stream of ${streamLength} bytes cannot hold ${wire.nodeCount} nodes`,
      wire.nodeStreamOffset
    );
  }
  if (reader.hasMore()) {
    throw new CorruptionError("E004", `${reader.remaining()} trailing bytes after the node stream`, reader.position());
  }

  return wire;
}
