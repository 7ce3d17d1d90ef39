import { reconstruct, type DecodeOptions } from "../graph/relocator.js";
import type { GraphNode } from "../types/node.js";
import { decodeBase85, encodeBase85 } from "./base85.js";
import { serialize, type SerializeOptions } from "./container.js";

/**
 * Serializes a graph straight to base-85 text.
 */
export function serializeToText(root: GraphNode, options: SerializeOptions): string {
  return encodeBase85(serialize(root, options));
}

/**
 * Reconstructs a graph from text produced by serializeToText.
 */
export function reconstructFromText(text: string, options: DecodeOptions = {}): GraphNode {
  return reconstruct(decodeBase85(text), options);
}
