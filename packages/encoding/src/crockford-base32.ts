/**
 * Crockford Base32
 *
 * 32 symbols without I, L, O and U. Decoding is case-insensitive and reads
 * the confusables I and L as 1 and O as 0. No padding and no check symbol.
 *
 * @see https://www.crockford.com/base32.html
 */

import { CorruptInputError } from "@basekit/base91";

const CB32_ALPHABET = "0123456789ABCDEFGHJKMNPQRSTVWXYZ";

const INVALID = -1;

const CB32_TABLE = new Int8Array(128).fill(INVALID);
for (let i = 0; i < CB32_ALPHABET.length; i++) {
  CB32_TABLE[CB32_ALPHABET.charCodeAt(i)] = i;
  CB32_TABLE[CB32_ALPHABET.toLowerCase().charCodeAt(i)] = i;
}
for (const [symbol, value] of [
  ["I", 1],
  ["L", 1],
  ["O", 0],
] as const) {
  CB32_TABLE[symbol.charCodeAt(0)] = value;
  CB32_TABLE[symbol.toLowerCase().charCodeAt(0)] = value;
}

function entry(code: number): number {
  return code < CB32_TABLE.length ? CB32_TABLE[code] : INVALID;
}

/**
 * Encode bytes as uppercase Crockford Base32. The last symbol is padded with
 * zero bits.
 */
export function encodeCB32(bytes: Uint8Array): string {
  let out = "";
  let acc = 0;
  let bits = 0;

  for (const byte of bytes) {
    acc = ((acc << 8) | byte) & 0xfff;
    bits += 8;
    while (bits >= 5) {
      bits -= 5;
      out += CB32_ALPHABET[(acc >> bits) & 0x1f];
    }
  }
  if (bits > 0) {
    out += CB32_ALPHABET[(acc << (5 - bits)) & 0x1f];
  }
  return out;
}

/**
 * Decode Crockford Base32. Trailing bits that do not fill a byte are dropped.
 *
 * @throws CorruptInputError at the first character outside the alphabet
 */
export function decodeCB32(text: string): Uint8Array {
  const out = new Uint8Array(Math.floor((text.length * 5) / 8));
  let acc = 0;
  let bits = 0;
  let n = 0;

  for (let i = 0; i < text.length; i++) {
    const value = entry(text.charCodeAt(i));
    if (value === INVALID) {
      throw new CorruptInputError("crockford32", i);
    }
    acc = ((acc << 5) | value) & 0xfff;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      out[n++] = (acc >> bits) & 0xff;
    }
  }
  return out;
}
