/**
 * Base45 encoding/decoding (RFC 9285)
 *
 * Each pair of bytes is read as a 16-bit value and written as three digits,
 * least significant first; a final odd byte becomes two digits.
 */

import { CorruptInputError } from "@basekit/base91";

const B45_ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ $%*+-./:";
const BASE = 45;
const BASE_SQ = BASE * BASE;

const B45_DECODE = new Map<string, number>();
for (let i = 0; i < B45_ALPHABET.length; i++) {
  B45_DECODE.set(B45_ALPHABET[i], i);
}

export function base45Encode(bytes: Uint8Array): string {
  let out = "";
  for (let i = 0; i + 1 < bytes.length; i += 2) {
    const n = (bytes[i] << 8) | bytes[i + 1];
    const rest = n % BASE_SQ;
    out += B45_ALPHABET[rest % BASE] + B45_ALPHABET[Math.floor(rest / BASE)];
    out += B45_ALPHABET[Math.floor(n / BASE_SQ)];
  }
  if (bytes.length % 2 === 1) {
    const n = bytes[bytes.length - 1];
    out += B45_ALPHABET[n % BASE] + B45_ALPHABET[Math.floor(n / BASE)];
  }
  return out;
}

/**
 * Decode Base45. The length must leave 0 or 2 characters after the last
 * full group of three.
 *
 * @throws CorruptInputError at an invalid character, at the start of a group
 *   whose value does not fit its bytes, or at a dangling last character
 */
export function base45Decode(str: string): Uint8Array {
  if (str.length % 3 === 1) {
    throw new CorruptInputError("base45", str.length - 1);
  }

  const out = new Uint8Array(Math.floor(str.length / 3) * 2 + (str.length % 3 === 2 ? 1 : 0));
  let n = 0;
  for (let i = 0; i < str.length; i += 3) {
    const width = Math.min(3, str.length - i);
    let value = 0;
    let scale = 1;
    for (let j = 0; j < width; j++) {
      const digit = B45_DECODE.get(str[i + j]);
      if (digit === undefined) throw new CorruptInputError("base45", i + j);
      value += digit * scale;
      scale *= BASE;
    }

    if (width === 3) {
      if (value > 0xffff) throw new CorruptInputError("base45", i);
      out[n++] = value >> 8;
      out[n++] = value & 0xff;
    } else {
      if (value > 0xff) throw new CorruptInputError("base45", i);
      out[n++] = value;
    }
  }
  return out;
}
