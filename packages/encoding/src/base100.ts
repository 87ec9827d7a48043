/**
 * Base100 encoding/decoding
 *
 * Every byte becomes one emoji, code point U+1F3F7 + byte, which is four
 * bytes of UTF-8. Error positions count those UTF-8 bytes.
 */

import { CorruptInputError } from "@basekit/base91";

const FIRST_CODE_POINT = 0x1f3f7;
const UTF8_WIDTH = 4;

export function base100Encode(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    out += String.fromCodePoint(FIRST_CODE_POINT + b);
  }
  return out;
}

/**
 * Decode Base100.
 *
 * @throws CorruptInputError at the UTF-8 offset of the first character that
 *   is not one of the 256 emoji
 */
export function base100Decode(str: string): Uint8Array {
  // Every valid symbol is a surrogate pair
  const out = new Uint8Array(str.length >> 1);
  let n = 0;
  for (let i = 0; i < str.length; i += 2) {
    const value = (str.codePointAt(i) ?? 0) - FIRST_CODE_POINT;
    if (value < 0 || value > 0xff) {
      throw new CorruptInputError("base100", n * UTF8_WIDTH);
    }
    out[n++] = value;
  }
  return out;
}
