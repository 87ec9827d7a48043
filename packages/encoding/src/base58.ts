/**
 * Base58 encoding/decoding (Bitcoin alphabet)
 *
 * The input is one big-endian integer written in radix 58. Each leading zero
 * byte is written as a leading "1", the digit for zero.
 */

import { CorruptInputError } from "@basekit/base91";

const B58_ALPHABET = "123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz";
const BASE = 58n;
const ZERO_DIGIT = B58_ALPHABET[0];

const B58_DECODE = new Map<string, number>();
for (let i = 0; i < B58_ALPHABET.length; i++) {
  B58_DECODE.set(B58_ALPHABET[i], i);
}

/**
 * Encode bytes to Base58.
 *
 * @example base58Encode(new Uint8Array([0, 0, 1])) → "112"
 */
export function base58Encode(bytes: Uint8Array): string {
  let zeros = 0;
  while (zeros < bytes.length && bytes[zeros] === 0) zeros++;

  let value = 0n;
  for (let i = zeros; i < bytes.length; i++) {
    value = (value << 8n) | BigInt(bytes[i]);
  }

  let digits = "";
  while (value > 0n) {
    digits = B58_ALPHABET[Number(value % BASE)] + digits;
    value /= BASE;
  }
  return ZERO_DIGIT.repeat(zeros) + digits;
}

/**
 * Decode Base58.
 *
 * @throws CorruptInputError at the first character outside the alphabet
 */
export function base58Decode(str: string): Uint8Array {
  let zeros = 0;
  while (zeros < str.length && str[zeros] === ZERO_DIGIT) zeros++;

  let value = 0n;
  for (let i = zeros; i < str.length; i++) {
    const digit = B58_DECODE.get(str[i]);
    if (digit === undefined) throw new CorruptInputError("base58", i);
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
