/**
 * Wire tags for literal values (the Value category).
 */
export enum LiteralTag {
  Nil = 0,
  Bool = 1,
  Int = 2,
  BigInt = 3,
  Float = 4,
  String = 5,
  Bytes = 6,
  Symbol = 7,
  Range = 8,
  Array = 9,
  Hash = 10,
  Regexp = 11,
}

/**
 * A literal value referenced from a node slot.
 *
 * Literals are interned by object identity: two structurally equal literals
 * held by different objects occupy two entries of the value table.
 */
export type Literal =
  | { type: "nil" }
  | { type: "bool"; value: boolean }
  | { type: "int"; value: bigint }
  | { type: "float"; value: number }
  | { type: "string"; value: string }
  | { type: "bytes"; value: Uint8Array }
  | {
      /** A symbol used as a value (distinct from a Symbol slot). */
      type: "symbol";
      name: string;
    }
  | { type: "range"; begin: Literal; end: Literal; exclusive: boolean }
  | { type: "array"; items: Literal[] }
  | { type: "hash"; entries: Array<[Literal, Literal]> }
  | { type: "regexp"; source: string; flags: string };

export type LiteralType = Literal["type"];

/** Deepest nesting of range, array and hash literals accepted on either side. */
export const MAX_LITERAL_DEPTH = 64;

const LITERAL_TYPES: ReadonlySet<string> = new Set<LiteralType>([
  "nil",
  "bool",
  "int",
  "float",
  "string",
  "bytes",
  "symbol",
  "range",
  "array",
  "hash",
  "regexp",
]);

/**
 * Returns true if the value carries a literal type tag.
 *
 * Only the tag is checked; nested fields are validated by the walker.
 */
export function isLiteral(value: unknown): value is Literal {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    LITERAL_TYPES.has(value.type)
  );
}

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;

/**
 * Returns the LiteralTag used on the wire for a literal.
 */
export function literalTag(literal: Literal): LiteralTag {
  switch (literal.type) {
    case "nil":
      return LiteralTag.Nil;
    case "bool":
      return LiteralTag.Bool;
    case "int":
      return literal.value >= INT64_MIN && literal.value <= INT64_MAX ? LiteralTag.Int : LiteralTag.BigInt;
    case "float":
      return LiteralTag.Float;
    case "string":
      return LiteralTag.String;
    case "bytes":
      return LiteralTag.Bytes;
    case "symbol":
      return LiteralTag.Symbol;
    case "range":
      return LiteralTag.Range;
    case "array":
      return LiteralTag.Array;
    case "hash":
      return LiteralTag.Hash;
    case "regexp":
      return LiteralTag.Regexp;
  }
}
