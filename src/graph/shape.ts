import { SchemaError } from "../errors.js";
import type { GraphNode } from "../types/node.js";
import { isSlotKind, SLOT_COUNT, type ShapeDescriptor } from "../types/slot.js";

/**
 * Content-dependent refinement of a kind's static shape.
 *
 * Returns the shape to use for this particular node, or `undefined` to keep
 * the static one. `parent` is the node through which the walker first reached
 * `node`; it is `undefined` for the root.
 */
export type ShapeOverride = (node: GraphNode, parent: GraphNode | undefined) => ShapeDescriptor | undefined;

function checkDescriptor(kind: string, shape: unknown): ShapeDescriptor {
  if (!Array.isArray(shape) || shape.length !== SLOT_COUNT) {
    throw new SchemaError(`shape of ${kind} must list exactly ${SLOT_COUNT} slot kinds`, kind);
  }
  const [a, b, c]: unknown[] = shape;
  if (!isSlotKind(a) || !isSlotKind(b) || !isSlotKind(c)) {
    throw new SchemaError(`shape of ${kind} contains an unknown slot kind`, kind);
  }
  return [a, b, c];
}

/**
 * Maps node kinds to slot shapes. The marshaller holds no kind-specific
 * knowledge; everything it knows about a grammar comes from this table.
 */
export class ShapeTable {
  private readonly shapes = new Map<string, ShapeDescriptor>();
  private readonly overrides = new Map<string, ShapeOverride>();

  constructor(
    shapes: Iterable<readonly [string, ShapeDescriptor]>,
    overrides: Iterable<readonly [string, ShapeOverride]> = []
  ) {
    for (const [kind, shape] of shapes) {
      if (this.shapes.has(kind)) {
        throw new SchemaError(`kind ${kind} is declared twice`, kind);
      }
      this.shapes.set(kind, checkDescriptor(kind, shape));
    }
    for (const [kind, override] of overrides) {
      if (!this.shapes.has(kind)) {
        throw new SchemaError(`override for undeclared kind ${kind}`, kind);
      }
      if (this.overrides.has(kind)) {
        throw new SchemaError(`kind ${kind} has two overrides`, kind);
      }
      this.overrides.set(kind, override);
    }
  }

  /**
   * Builds a table from a plain `kind -> shape` record.
   */
  static fromRecord(record: Readonly<Record<string, ShapeDescriptor>>): ShapeTable {
    return new ShapeTable(Object.entries(record));
  }

  has(kind: string): boolean {
    return this.shapes.has(kind);
  }

  hasOverride(kind: string): boolean {
    return this.overrides.has(kind);
  }

  kinds(): string[] {
    return Array.from(this.shapes.keys());
  }

  /**
   * Static shape of a kind.
   * @throws SchemaError if the kind is not declared
   */
  shapeOf(kind: string): ShapeDescriptor {
    const shape = this.shapes.get(kind);
    if (shape === undefined) {
      throw new SchemaError(`no shape declared for node kind ${kind}`, kind);
    }
    return shape;
  }

  /**
   * Effective shape of a node: its kind's override when that returns a
   * descriptor, the static shape otherwise.
   */
  resolve(node: GraphNode, parent?: GraphNode): ShapeDescriptor {
    const shape = this.shapeOf(node.kind);
    const override = this.overrides.get(node.kind);
    if (override === undefined) {
      return shape;
    }
    const refined = override(node, parent);
    return refined === undefined ? shape : checkDescriptor(node.kind, refined);
  }
}
