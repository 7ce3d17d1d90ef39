/**
 * Big-endian word packing with leading zero bytes stripped.
 *
 * A word of `wordSize` bytes encodes to 0..wordSize bytes; zero encodes to
 * nothing at all. The byte count travels separately in a 4-bit field, which
 * caps the word size at 15 bytes.
 */

export const MAX_WORD_SIZE = 15;
export const DEFAULT_WORD_SIZE = 8;

/**
 * Throws if the word size cannot be described by a 4-bit length field.
 */
export function assertWordSize(wordSize: number): void {
  if (!Number.isInteger(wordSize) || wordSize < 1 || wordSize > MAX_WORD_SIZE) {
    throw new RangeError(`word size ${wordSize} is outside [1, ${MAX_WORD_SIZE}]`);
  }
}

/**
 * Largest unsigned value a word of the given size can hold.
 */
export function maxWord(wordSize: number = DEFAULT_WORD_SIZE): bigint {
  return (1n << BigInt(wordSize * 8)) - 1n;
}

export function fitsWord(value: bigint, wordSize: number = DEFAULT_WORD_SIZE): boolean {
  return value >= 0n && value <= maxWord(wordSize);
}

/**
 * Encodes an unsigned word, most significant byte first, without leading zeros.
 */
export function encodeWord(value: bigint, wordSize: number = DEFAULT_WORD_SIZE): Uint8Array {
  assertWordSize(wordSize);
  if (!fitsWord(value, wordSize)) {
    throw new RangeError(`value ${value} does not fit a ${wordSize}-byte word`);
  }
  const bytes: number[] = [];
  for (let i = wordSize - 1; i >= 0; i--) {
    const byte = Number((value >> BigInt(i * 8)) & 0xffn);
    if (bytes.length > 0 || byte !== 0) {
      bytes.push(byte);
    }
  }
  return Uint8Array.from(bytes);
}

/**
 * Reassembles a big-endian word; missing high-order bytes are zero.
 */
export function decodeWord(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}
