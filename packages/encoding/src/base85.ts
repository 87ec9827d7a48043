/**
 * Base85 encoding/decoding (Adobe ASCII85 alphabet `!` to `u`)
 *
 * Four bytes become five digits, most significant first. A full group of
 * four zero bytes is written as "z". A final group of k bytes is padded with
 * zeros and cut to k + 1 digits. No `<~ ~>` delimiters.
 */

import { CorruptInputError } from "@basekit/base91";

const FIRST = 0x21; // "!"
const LAST = 0x75; // "u"
const ZERO_GROUP = 0x7a; // "z"
const BASE = 85;
const MAX_GROUP = 0xffffffff;

// Decoding skips whitespace
const WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0b, 0x0c, 0x0d]);

export function base85Encode(bytes: Uint8Array): string {
  let out = "";
  const digits = new Array<string>(5);

  for (let i = 0; i < bytes.length; i += 4) {
    const k = Math.min(4, bytes.length - i);
    let value = 0;
    for (let j = 0; j < 4; j++) {
      value = value * 256 + (j < k ? bytes[i + j] : 0);
    }

    if (k === 4 && value === 0) {
      out += "z";
      continue;
    }
    for (let j = 4; j >= 0; j--) {
      digits[j] = String.fromCharCode(FIRST + (value % BASE));
      value = Math.floor(value / BASE);
    }
    out += digits.slice(0, k + 1).join("");
  }
  return out;
}

/**
 * Decode Base85. "z" is only accepted between groups.
 *
 * @throws CorruptInputError at an invalid character, at the start of a group
 *   whose value overflows 32 bits, or at a lone digit left at the end
 */
export function base85Decode(str: string): Uint8Array {
  const out: number[] = [];
  let value = 0;
  let count = 0;
  let groupStart = 0;

  for (let i = 0; i < str.length; i++) {
    const c = str.charCodeAt(i);
    if (WHITESPACE.has(c)) continue;
    if (c === ZERO_GROUP && count === 0) {
      out.push(0, 0, 0, 0);
      continue;
    }
    if (c < FIRST || c > LAST) throw new CorruptInputError("base85", i);

    if (count === 0) groupStart = i;
    value = value * BASE + (c - FIRST);
    count++;
    if (count === 5) {
      pushGroup(out, value, 4, groupStart);
      value = 0;
      count = 0;
    }
  }

  if (count === 1) throw new CorruptInputError("base85", groupStart);
  if (count > 1) {
    for (let j = count; j < 5; j++) value = value * BASE + (LAST - FIRST);
    pushGroup(out, value, count - 1, groupStart);
  }
  return new Uint8Array(out);
}

function pushGroup(out: number[], value: number, n: number, groupStart: number): void {
  if (value > MAX_GROUP) throw new CorruptInputError("base85", groupStart);
  for (let shift = 24, j = 0; j < n; j++, shift -= 8) {
    out.push((value >>> shift) & 0xff);
  }
}
