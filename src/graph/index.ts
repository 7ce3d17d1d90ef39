export { InternTable, InternTables, type Category, type CategoryKey, type CategoryPayload } from "./intern.js";

export { ShapeTable, type ShapeOverride } from "./shape.js";

export { walk, type NodeEntry, type SerializedForm, type WalkOptions } from "./walker.js";

export {
  Relocator,
  reconstruct,
  load,
  type DecodeOptions,
  type LoadedGraph,
  type RelocatorPhase,
  type RelocatorState,
} from "./relocator.js";
