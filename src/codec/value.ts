import { CorruptionError, SchemaError } from "../errors.js";
import { LiteralTag, literalTag, MAX_LITERAL_DEPTH, type Literal } from "../types/value.js";
import { MAX_STRING_LEN, Reader, Writer } from "./primitives.js";
import { decodeWord } from "./word.js";

const utf8 = new TextEncoder();

function encodeText(writer: Writer, text: string): void {
  const bytes = utf8.encode(text);
  if (bytes.length > MAX_STRING_LEN) {
    throw new SchemaError(`string of ${bytes.length} bytes exceeds maximum ${MAX_STRING_LEN}`);
  }
  writer.writeLengthPrefixedBytes(bytes);
}

function magnitudeBytes(magnitude: bigint): Uint8Array {
  const bytes: number[] = [];
  for (let v = magnitude; v > 0n; v >>= 8n) {
    bytes.unshift(Number(v & 0xffn));
  }
  return Uint8Array.from(bytes);
}

/**
 * Encodes a literal: tag byte followed by the payload.
 *
 * Ints inside the signed 64-bit range are ZigZag varints; larger ones carry a
 * sign byte and a length-prefixed big-endian magnitude.
 */
export function encodeLiteral(writer: Writer, literal: Literal, depth: number = 0): void {
  if (depth > MAX_LITERAL_DEPTH) {
    throw new SchemaError(`literal nesting exceeds ${MAX_LITERAL_DEPTH} levels`);
  }
  const tag = literalTag(literal);
  writer.writeByte(tag);

  switch (literal.type) {
    case "nil":
      break;

    case "bool":
      writer.writeByte(literal.value ? 0x01 : 0x00);
      break;

    case "int":
      if (tag === LiteralTag.Int) {
        writer.writeSignedVarint(literal.value);
      } else {
        const negative = literal.value < 0n;
        writer.writeByte(negative ? 0x01 : 0x00);
        writer.writeLengthPrefixedBytes(magnitudeBytes(negative ? -literal.value : literal.value));
      }
      break;

    case "float":
      if (Number.isNaN(literal.value)) {
        throw new SchemaError("NaN is not allowed in a float literal");
      }
      writer.writeFloat64(literal.value);
      break;

    case "string":
      encodeText(writer, literal.value);
      break;

    case "bytes":
      if (literal.value.length > MAX_STRING_LEN) {
        throw new SchemaError(`byte string of ${literal.value.length} bytes exceeds maximum ${MAX_STRING_LEN}`);
      }
      writer.writeLengthPrefixedBytes(literal.value);
      break;

    case "symbol":
      encodeText(writer, literal.name);
      break;

    case "range":
      encodeLiteral(writer, literal.begin, depth + 1);
      encodeLiteral(writer, literal.end, depth + 1);
      writer.writeByte(literal.exclusive ? 0x01 : 0x00);
      break;

    case "array":
      writer.writeVarintNumber(literal.items.length);
      for (const item of literal.items) {
        encodeLiteral(writer, item, depth + 1);
      }
      break;

    case "hash":
      writer.writeVarintNumber(literal.entries.length);
      for (const [key, value] of literal.entries) {
        encodeLiteral(writer, key, depth + 1);
        encodeLiteral(writer, value, depth + 1);
      }
      break;

    case "regexp":
      encodeText(writer, literal.source);
      encodeText(writer, literal.flags);
      break;
  }
}

function readFlag(reader: Reader, what: string): boolean {
  const byte = reader.readByte();
  if (byte !== 0x00 && byte !== 0x01) {
    throw new CorruptionError("E004", `invalid ${what} byte: ${byte}`, reader.position() - 1);
  }
  return byte === 0x01;
}

function readCount(reader: Reader, perItem: number): number {
  const count = reader.readVarintNumber();
  if (count * perItem > reader.remaining()) {
    throw new CorruptionError("E005", `collection of ${count} items overruns the input`, reader.position());
  }
  return count;
}

/**
 * Decodes a literal written by encodeLiteral.
 */
export function decodeLiteral(reader: Reader, depth: number = 0): Literal {
  if (depth > MAX_LITERAL_DEPTH) {
    throw new CorruptionError("E005", `literal nesting exceeds ${MAX_LITERAL_DEPTH} levels`, reader.position());
  }
  const tagOffset = reader.position();
  const tag = reader.readByte();

  switch (tag) {
    case LiteralTag.Nil:
      return { type: "nil" };

    case LiteralTag.Bool:
      return { type: "bool", value: readFlag(reader, "bool") };

    case LiteralTag.Int:
      return { type: "int", value: reader.readSignedVarint() };

    case LiteralTag.BigInt: {
      const negative = readFlag(reader, "sign");
      const magnitude = decodeWord(reader.readLengthPrefixedBytes());
      return { type: "int", value: negative ? -magnitude : magnitude };
    }

    case LiteralTag.Float: {
      const value = reader.readFloat64();
      if (Number.isNaN(value)) {
        throw new CorruptionError("E004", "float literal is NaN", tagOffset);
      }
      return { type: "float", value };
    }

    case LiteralTag.String:
      return { type: "string", value: reader.readString(MAX_STRING_LEN) };

    case LiteralTag.Bytes:
      return { type: "bytes", value: reader.readLengthPrefixedBytes() };

    case LiteralTag.Symbol:
      return { type: "symbol", name: reader.readString(MAX_STRING_LEN) };

    case LiteralTag.Range: {
      const begin = decodeLiteral(reader, depth + 1);
      const end = decodeLiteral(reader, depth + 1);
      return { type: "range", begin, end, exclusive: readFlag(reader, "range flag") };
    }

    case LiteralTag.Array: {
      const count = readCount(reader, 1);
      const items: Literal[] = [];
      for (let i = 0; i < count; i++) {
        items.push(decodeLiteral(reader, depth + 1));
      }
      return { type: "array", items };
    }

    case LiteralTag.Hash: {
      const count = readCount(reader, 2);
      const entries: Array<[Literal, Literal]> = [];
      for (let i = 0; i < count; i++) {
        const key = decodeLiteral(reader, depth + 1);
        const value = decodeLiteral(reader, depth + 1);
        entries.push([key, value]);
      }
      return { type: "hash", entries };
    }

    case LiteralTag.Regexp: {
      const source = reader.readString(MAX_STRING_LEN);
      const flags = reader.readString(MAX_STRING_LEN);
      return { type: "regexp", source, flags };
    }

    default:
      throw new CorruptionError("E004", `unknown literal tag: ${tag}`, tagOffset);
  }
}
