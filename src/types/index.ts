export * from "./container.js";
export * from "./node.js";
export * from "./slot.js";
export * from "./value.js";
