/**
 * Base class for every failure raised while marshalling a graph.
 *
 * Messages are prefixed with a short code so callers can match on the
 * category without parsing prose:
 * - E001: compatibility (magic, platform or version tag mismatch)
 * - E002: ordinal out of range
 * - E003: schema violation in the input graph
 * - E004: invalid encoding
 * - E005: truncated input or a size limit exceeded
 */
export class MarshalError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(`[${code}] ${message}`);
    this.name = "MarshalError";
  }
}

/**
 * The input graph does not conform to its shape table.
 */
export class SchemaError extends MarshalError {
  constructor(
    message: string,
    public readonly kind?: string,
    public readonly nodeIndex?: number
  ) {
    super("E003", message);
    this.name = "SchemaError";
  }
}

export type CorruptionCode = "E002" | "E004" | "E005";

/**
 * The byte container (or its base-85 text form) is damaged.
 */
export class CorruptionError extends MarshalError {
  constructor(
    code: CorruptionCode,
    message: string,
    public readonly offset?: number
  ) {
    super(code, offset === undefined ? message : `${message} (at offset ${offset})`);
    this.name = "CorruptionError";
  }
}

/**
 * The container was produced by a different format, platform or runtime.
 */
export class CompatibilityError extends MarshalError {
  constructor(
    message: string,
    public readonly expected: string,
    public readonly found: string
  ) {
    super("E001", `${message}: expected ${JSON.stringify(expected)}, found ${JSON.stringify(found)}`);
    this.name = "CompatibilityError";
  }
}
