/**
 * Base32 encoding/decoding (RFC 4648 Section 6)
 *
 * Standard alphabet A-Z 2-7, output padded with `=` to a multiple of 8.
 */

import { CorruptInputError } from "@basekit/base91";

const B32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

const B32_DECODE: Record<string, number | undefined> = {};
for (let i = 0; i < B32_ALPHABET.length; i++) {
  B32_DECODE[B32_ALPHABET[i]] = i;
}

// Valid counts of data characters in a final 8-character block
const VALID_TAIL = new Set([0, 2, 4, 5, 7]);

/**
 * Encode bytes to padded Base32.
 */
export function base32Encode(bytes: Uint8Array): string {
  let result = "";
  let buffer = 0;
  let bitsLeft = 0;

  for (const byte of bytes) {
    buffer = ((buffer << 8) | byte) & 0xffff;
    bitsLeft += 8;

    while (bitsLeft >= 5) {
      bitsLeft -= 5;
      result += B32_ALPHABET[(buffer >> bitsLeft) & 0x1f];
    }
  }

  if (bitsLeft > 0) {
    result += B32_ALPHABET[(buffer << (5 - bitsLeft)) & 0x1f];
  }

  return result.padEnd(Math.ceil(result.length / 8) * 8, "=");
}

/**
 * Decode padded Base32.
 *
 * @throws CorruptInputError at the first invalid character or bad padding
 */
export function base32Decode(str: string): Uint8Array {
  if (str.length % 8 !== 0) {
    throw new CorruptInputError("base32", str.length - (str.length % 8));
  }

  let end = str.length;
  while (end > 0 && str[end - 1] === "=") end--;
  if (!VALID_TAIL.has(end % 8) || str.length - end > 6) {
    throw new CorruptInputError("base32", end);
  }

  let buffer = 0;
  let bitsLeft = 0;
  const result: number[] = [];

  for (let i = 0; i < end; i++) {
    const value = B32_DECODE[str[i]];
    if (value === undefined) {
      throw new CorruptInputError("base32", i);
    }

    buffer = ((buffer << 5) | value) & 0xffff;
    bitsLeft += 5;

    if (bitsLeft >= 8) {
      bitsLeft -= 8;
      result.push((buffer >> bitsLeft) & 0xff);
    }
  }

  return new Uint8Array(result);
}
