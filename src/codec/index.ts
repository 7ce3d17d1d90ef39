export {
  serialize,
  encodeGraph,
  readContainer,
  type EncodeOptions,
  type SerializeOptions,
} from "./container.js";

export {
  encodeNodeRecord,
  decodeNodeRecord,
  NODE_HEADER_SIZE,
  type DecodedNode,
  type NodeStreamIndices,
  type NodeStreamLookups,
} from "./nodes.js";

export { encodeLiteral, decodeLiteral } from "./value.js";

export {
  Writer,
  Reader,
  MAX_DICT_SIZE,
  MAX_STRING_LEN,
  zigzagEncode,
  zigzagDecode,
} from "./primitives.js";

export {
  encodeWord,
  decodeWord,
  fitsWord,
  maxWord,
  DEFAULT_WORD_SIZE,
  MAX_WORD_SIZE,
} from "./word.js";

export { encodeBase85, decodeBase85 } from "./base85.js";

export { serializeToText, reconstructFromText } from "./text.js";
