import type { SymbolName } from "./node.js";
import type { Literal } from "./value.js";

/**
 * Descriptive strings carried through the container unchanged.
 */
export interface ContainerInfo {
  /** Symbolic name of the graph (e.g. "<main>"). */
  name?: string;
  /** Origin label, usually the source file name. */
  originLabel?: string;
  /** Full path of the origin. */
  originPath?: string;
}

/**
 * Tags describing the runtime that writes or reads a container.
 *
 * A container is only loaded by an environment whose platform and version
 * tags match the ones it was written with.
 */
export interface MarshalEnvironment {
  platform: string;
  version: string;
  /** Bytes per raw word, 1..15. */
  wordSize: number;
}

/**
 * An args record as stored on the wire. Node and symbol references are
 * ordinals, `undefined` when absent.
 */
export interface WireArgsRecord {
  preInit: number | undefined;
  postInit: number | undefined;
  preArgsNum: number;
  postArgsNum: number;
  firstPostArg: number | undefined;
  restArg: number | undefined;
  blockArg: number | undefined;
  kwArgs: number | undefined;
  kwRestArg: number | undefined;
  optArgs: number | undefined;
}

/**
 * Everything read from a container before any node is allocated.
 */
export interface WireTables {
  platform: string;
  version: string;
  info: ContainerInfo;
  nodeCount: number;
  kinds: string[];
  symbols: SymbolName[];
  values: Literal[];
  /** Each group is a list of symbol ordinals. */
  identifierGroups: number[][];
  argsRecords: WireArgsRecord[];
  /** Symbol ordinal of each binding. */
  bindings: number[];
  /** Raw node stream. */
  nodeStream: Uint8Array;
  /** Offset of the node stream inside the container. */
  nodeStreamOffset: number;
}

/**
 * Creates empty wire tables.
 */
export function createWireTables(): WireTables {
  return {
    platform: "",
    version: "",
    info: {},
    nodeCount: 0,
    kinds: [],
    symbols: [],
    values: [],
    identifierGroups: [],
    argsRecords: [],
    bindings: [],
    nodeStream: new Uint8Array(0),
    nodeStreamOffset: 0,
  };
}
