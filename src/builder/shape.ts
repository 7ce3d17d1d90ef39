import { SchemaError } from "../errors.js";
import { ShapeTable, type ShapeOverride } from "../graph/shape.js";
import type { ShapeDescriptor } from "../types/slot.js";

/**
 * Builder for constructing a ShapeTable.
 */
export class ShapeTableBuilder {
  private readonly shapes: Array<[string, ShapeDescriptor]> = [];
  private readonly overrides: Array<[string, ShapeOverride]> = [];

  /**
   * Declares a node kind and its static shape.
   */
  kind(name: string, shape: ShapeDescriptor): this {
    if (this.shapes.some(([existing]) => existing === name)) {
      throw new SchemaError(`kind ${name} is declared twice`, name);
    }
    this.shapes.push([name, shape]);
    return this;
  }

  /**
   * Declares several kinds sharing one shape.
   */
  kinds(names: string[], shape: ShapeDescriptor): this {
    for (const name of names) {
      this.kind(name, shape);
    }
    return this;
  }

  /**
   * Registers a content-dependent override for an already declared kind.
   */
  refine(name: string, override: ShapeOverride): this {
    this.overrides.push([name, override]);
    return this;
  }

  build(): ShapeTable {
    return new ShapeTable(this.shapes, this.overrides);
  }
}
