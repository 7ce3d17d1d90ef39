export { defaultEnvironment, resolveEnvironment } from "./env.js";

export { formatGraph, formatLiteral, type FormatOptions } from "./format.js";
