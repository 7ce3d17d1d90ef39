import { CorruptionError } from "../errors.js";
import { decodeWord } from "./word.js";

/** Longest string (in UTF-8 bytes) written to or read from a container. */
export const MAX_STRING_LEN = 16 * 1024 * 1024;

/** Largest entry count of any table in a container. */
export const MAX_DICT_SIZE = 1_000_000;

/**
 * ZigZag encodes a signed integer to an unsigned integer.
 */
export function zigzagEncode(n: bigint): bigint {
  return n >= 0n ? n << 1n : ((-n) << 1n) - 1n;
}

/**
 * ZigZag decodes an unsigned integer to a signed integer.
 */
export function zigzagDecode(n: bigint): bigint {
  return (n & 1n) === 0n ? n >> 1n : -((n + 1n) >> 1n);
}

/**
 * Binary writer for graph containers.
 */
export class Writer {
  private buffer: Uint8Array;
  private pos: number = 0;

  constructor(initialCapacity: number = 1024) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 16));
  }

  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required > this.buffer.length) {
      let newCapacity = this.buffer.length * 2;
      while (newCapacity < required) {
        newCapacity *= 2;
      }
      const newBuffer = new Uint8Array(newCapacity);
      newBuffer.set(this.buffer);
      this.buffer = newBuffer;
    }
  }

  /**
   * Returns the written bytes.
   */
  finish(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Writes a single byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value;
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  /**
   * Writes an unsigned varint (LEB128).
   */
  writeVarint(value: bigint): void {
    if (value < 0n) {
      throw new Error("writeVarint requires non-negative value");
    }
    let v = value;
    do {
      let byte = Number(v & 0x7fn);
      v >>= 7n;
      if (v !== 0n) {
        byte |= 0x80;
      }
      this.writeByte(byte);
    } while (v !== 0n);
  }

  /**
   * Writes an unsigned varint from a number.
   */
  writeVarintNumber(value: number): void {
    this.writeVarint(BigInt(value));
  }

  /**
   * Writes a signed varint (ZigZag encoded).
   */
  writeSignedVarint(value: bigint): void {
    this.writeVarint(zigzagEncode(value));
  }

  /**
   * Writes a length-prefixed string (UTF-8).
   */
  writeString(s: string): void {
    const bytes = new TextEncoder().encode(s);
    this.writeVarintNumber(bytes.length);
    this.writeBytes(bytes);
  }

  /**
   * Writes a presence byte followed by the string when present.
   */
  writeOptionalString(s: string | undefined): void {
    if (s === undefined) {
      this.writeByte(0x00);
    } else {
      this.writeByte(0x01);
      this.writeString(s);
    }
  }

  /**
   * Writes a length-prefixed byte array.
   */
  writeLengthPrefixedBytes(bytes: Uint8Array): void {
    this.writeVarintNumber(bytes.length);
    this.writeBytes(bytes);
  }

  /**
   * Writes a 64-bit float (IEEE 754, little-endian).
   */
  writeFloat64(value: number): void {
    this.ensureCapacity(8);
    const view = new DataView(this.buffer.buffer, this.buffer.byteOffset + this.pos, 8);
    view.setFloat64(0, value, true);
    this.pos += 8;
  }
}

/**
 * Binary reader for graph containers.
 *
 * `baseOffset` is added to positions reported in errors, so a reader over a
 * sub-section of a container still points at the right byte.
 */
export class Reader {
  private buffer: Uint8Array;
  private pos: number = 0;

  constructor(
    buffer: Uint8Array,
    private readonly baseOffset: number = 0
  ) {
    this.buffer = buffer;
  }

  /**
   * Returns true if there are more bytes to read.
   */
  hasMore(): boolean {
    return this.pos < this.buffer.length;
  }

  /**
   * Returns the current position, relative to the start of the container.
   */
  position(): number {
    return this.baseOffset + this.pos;
  }

  /**
   * Returns remaining bytes.
   */
  remaining(): number {
    return this.buffer.length - this.pos;
  }

  /**
   * Reads a single byte.
   */
  readByte(): number {
    if (this.pos >= this.buffer.length) {
      throw new CorruptionError("E005", "unexpected end of input", this.position());
    }
    return this.buffer[this.pos++];
  }

  /**
   * Reads raw bytes.
   */
  readBytes(n: number): Uint8Array {
    if (this.pos + n > this.buffer.length) {
      throw new CorruptionError(
        "E005",
        `unexpected end of input: need ${n} bytes, have ${this.buffer.length - this.pos}`,
        this.position()
      );
    }
    const result = this.buffer.subarray(this.pos, this.pos + n);
    this.pos += n;
    return result;
  }

  /**
   * Reads a stripped big-endian word of `length` bytes.
   */
  readWord(length: number, wordSize: number): bigint {
    if (length > wordSize) {
      throw new CorruptionError("E004", `word length ${length} exceeds word size ${wordSize}`, this.position());
    }
    return decodeWord(this.readBytes(length));
  }

  /**
   * Reads an unsigned varint (LEB128).
   */
  readVarint(): bigint {
    let result = 0n;
    let shift = 0n;
    let byteCount = 0;

    while (true) {
      const byte = this.readByte();
      byteCount++;

      if (byteCount > 10) {
        throw new CorruptionError("E005", "varint exceeds maximum length (10 bytes)", this.position());
      }

      result |= BigInt(byte & 0x7f) << shift;
      shift += 7n;

      if ((byte & 0x80) === 0) {
        break;
      }
    }

    return result;
  }

  /**
   * Reads an unsigned varint as a number (throws if > MAX_SAFE_INTEGER).
   */
  readVarintNumber(): number {
    const value = this.readVarint();
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new CorruptionError("E005", "varint value exceeds safe integer range", this.position());
    }
    return Number(value);
  }

  /**
   * Reads a signed varint (ZigZag encoded).
   */
  readSignedVarint(): bigint {
    return zigzagDecode(this.readVarint());
  }

  /**
   * Reads a length-prefixed string (UTF-8).
   */
  readString(maxLength: number = Number.MAX_SAFE_INTEGER): string {
    const len = this.readVarintNumber();
    if (len > maxLength) {
      throw new CorruptionError("E005", `string length ${len} exceeds maximum ${maxLength}`, this.position());
    }
    const start = this.position();
    const bytes = this.readBytes(len);
    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch {
      throw new CorruptionError("E004", "invalid UTF-8 in string", start);
    }
  }

  /**
   * Reads a presence byte and, when set, the string that follows.
   */
  readOptionalString(maxLength?: number): string | undefined {
    const flag = this.readByte();
    if (flag === 0x00) {
      return undefined;
    }
    if (flag !== 0x01) {
      throw new CorruptionError("E004", `invalid presence flag: ${flag}`, this.position() - 1);
    }
    return this.readString(maxLength);
  }

  /**
   * Reads a length-prefixed byte array.
   */
  readLengthPrefixedBytes(): Uint8Array {
    const len = this.readVarintNumber();
    return new Uint8Array(this.readBytes(len));
  }

  /**
   * Reads a 64-bit float (IEEE 754, little-endian).
   */
  readFloat64(): number {
    const bytes = this.readBytes(8);
    const view = new DataView(bytes.buffer, bytes.byteOffset, 8);
    return view.getFloat64(0, true);
  }
}
