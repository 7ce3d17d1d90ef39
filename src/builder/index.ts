export { ShapeTableBuilder } from "./shape.js";
