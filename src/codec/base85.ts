import { CorruptionError } from "../errors.js";

/**
 * Text-safe base-85 variant.
 *
 * Output layout: a space, one alphabet character giving `length % 4`, then five
 * digits per big-endian 4-byte group (most significant digit first, the last
 * group zero-padded). A line break followed by a space is inserted after every
 * 14 groups. The alphabet avoids backslash, both quotes, `#` and braces, so the
 * text can sit inside a double-quoted literal without escaping.
 */

const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789!$%&()*-./:;<=>?@[]^,_|";

const GROUPS_PER_LINE = 14;
const LINE_BREAK = "\n ";
const DIGIT_WEIGHTS = [52200625, 614125, 7225, 85, 1] as const;
const MAX_GROUP = 0xffffffff;

const DIGIT_VALUES: ReadonlyMap<string, number> = (() => {
  const values = new Map<string, number>();
  for (let i = 0; i < ALPHABET.length; i++) {
    values.set(ALPHABET[i], i);
  }
  if (ALPHABET.length !== 85 || values.size !== 85) {
    throw new Error("base-85 alphabet must hold 85 distinct characters");
  }
  return values;
})();

/**
 * Encodes bytes as base-85 text. Empty input encodes to `" A"`.
 */
export function encodeBase85(data: Uint8Array): string {
  const parts: string[] = [" ", ALPHABET[data.length % 4]];
  for (let pos = 0; pos < data.length; ) {
    let group = 0;
    for (let shift = 24; shift >= 0; shift -= 8) {
      if (pos < data.length) {
        group += data[pos++] * 2 ** shift;
      }
    }
    for (const weight of DIGIT_WEIGHTS) {
      parts.push(ALPHABET[Math.floor(group / weight) % 85]);
    }
    if (pos % (4 * GROUPS_PER_LINE) === 0) {
      parts.push(LINE_BREAK);
    }
  }
  return parts.join("");
}

/**
 * Decodes base-85 text written by encodeBase85.
 *
 * Characters outside the alphabet (spaces, line breaks) are skipped.
 *
 * @throws CorruptionError on a missing header, a tail length above 4, a
 * partial group or a group value that does not fit 32 bits
 */
export function decodeBase85(text: string): Uint8Array {
  const out: number[] = [];
  let tail = -1;
  let group = 0;
  let digits = 0;

  for (let pos = 0; pos < text.length; pos++) {
    const digit = DIGIT_VALUES.get(text[pos]);
    if (digit === undefined) {
      continue;
    }
    if (tail === -1) {
      if (digit > 4) {
        throw new CorruptionError("E004", `invalid tail length ${digit}`, pos);
      }
      tail = digit;
      continue;
    }
    group += digit * DIGIT_WEIGHTS[digits++];
    if (digits === 5) {
      if (group > MAX_GROUP) {
        throw new CorruptionError("E004", `group value ${group} does not fit 32 bits`, pos);
      }
      out.push((group >>> 24) & 0xff, (group >>> 16) & 0xff, (group >>> 8) & 0xff, group & 0xff);
      group = 0;
      digits = 0;
    }
  }

  if (tail === -1) {
    throw new CorruptionError("E005", "missing length header");
  }
  if (digits !== 0) {
    throw new CorruptionError("E005", `truncated group: ${digits} of 5 digits`, text.length);
  }
  if (tail !== 0) {
    if (out.length === 0) {
      throw new CorruptionError("E005", `tail length ${tail} without data`);
    }
    out.length -= 4 - tail;
  }
  return Uint8Array.from(out);
}
