/**
 * irgraph
 *
 * Schema-driven marshalling of typed, fixed-arity node graphs into a compact,
 * relocatable binary container, with a text-safe base-85 transport.
 *
 * @packageDocumentation
 */

// Types
export * from "./types/index.js";

// Errors
export { MarshalError, SchemaError, CorruptionError, CompatibilityError, type CorruptionCode } from "./errors.js";

// Builders
export * from "./builder/index.js";

// Ops (functional API)
export * from "./ops/index.js";

// Graph: interning, shapes, walker, relocator
export * from "./graph/index.js";

// Utilities
export * from "./util/index.js";

// Codec
export {
  serialize,
  encodeGraph,
  readContainer,
  type EncodeOptions,
  type SerializeOptions,
  encodeWord,
  decodeWord,
  DEFAULT_WORD_SIZE,
  MAX_WORD_SIZE,
  encodeBase85,
  decodeBase85,
  serializeToText,
  reconstructFromText,
  Writer,
  Reader,
} from "./codec/index.js";
