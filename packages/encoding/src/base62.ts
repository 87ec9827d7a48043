/**
 * Base62 encoding/decoding
 *
 * The input is read as one big-endian integer and written in radix 62
 * (digits, then A-Z, then a-z). Leading zero bytes would vanish from the
 * integer, so they are written first as `0`-prefixed counts: each run of up
 * to 61 zero bytes becomes "0" followed by the digit for the run length.
 */

import { CorruptInputError } from "@basekit/base91";

const B62_ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const BASE = 62n;
const MAX_RUN = B62_ALPHABET.length - 1;

const B62_DECODE = new Map<string, number>();
for (let i = 0; i < B62_ALPHABET.length; i++) {
  B62_DECODE.set(B62_ALPHABET[i], i);
}

/**
 * Encode bytes to Base62.
 *
 * @example base62Encode(new Uint8Array([0, 1])) → "011"
 */
export function base62Encode(bytes: Uint8Array): string {
  let zeros = 0;
  while (zeros < bytes.length && bytes[zeros] === 0) zeros++;

  let prefix = "";
  for (let run = zeros; run > 0; run -= MAX_RUN) {
    prefix += `0${B62_ALPHABET[Math.min(run, MAX_RUN)]}`;
  }
  if (zeros === bytes.length) return prefix;

  let value = 0n;
  for (let i = zeros; i < bytes.length; i++) {
    value = (value << 8n) | BigInt(bytes[i]);
  }

  let digits = "";
  while (value > 0n) {
    digits = B62_ALPHABET[Number(value % BASE)] + digits;
    value /= BASE;
  }
  return prefix + digits;
}

/**
 * Decode Base62.
 *
 * @throws CorruptInputError at the first character outside the alphabet
 */
export function base62Decode(str: string): Uint8Array {
  let offset = 0;
  let zeros = 0;
  while (str.length - offset >= 2 && str[offset] === "0") {
    const run = B62_DECODE.get(str[offset + 1]);
    if (run === undefined) throw new CorruptInputError("base62", offset + 1);
    zeros += run;
    offset += 2;
  }

  let value = 0n;
  for (let i = offset; i < str.length; i++) {
    const digit = B62_DECODE.get(str[i]);
    if (digit === undefined) throw new CorruptInputError("base62", i);
    value = value * BASE + BigInt(digit);
  }

  const body: number[] = [];
  while (value > 0n) {
    body.push(Number(value & 0xffn));
    value >>= 8n;
  }

  const out = new Uint8Array(zeros + body.length);
  for (let i = 0; i < body.length; i++) {
    out[out.length - 1 - i] = body[i];
  }
  return out;
}
