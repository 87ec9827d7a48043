/**
 * One-shot base91 encode/decode over fully materialized buffers.
 */

import { BitPacker } from "./packer.ts";
import { BitUnpacker } from "./unpacker.ts";

const textEncoder = new TextEncoder();

/**
 * Upper bound on the encoded length of `n` bytes. The worst case packs
 * 13 bits into every two symbols.
 */
export function encodedLen(n: number): number {
  return Math.ceil((n * 16) / 13);
}

/**
 * Upper bound on the decoded length of `n` symbols. The best case packs
 * 14 bits into every two symbols.
 */
export function decodedLen(n: number): number {
  return Math.ceil((n * 14) / 16);
}

/**
 * Encode bytes to base91 symbols (ASCII bytes).
 */
export function encode(src: Uint8Array): Uint8Array {
  if (src.length === 0) return new Uint8Array(0);

  const packer = new BitPacker();
  const dst = new Uint8Array(encodedLen(src.length));
  let n = 0;
  for (let i = 0; i < src.length; i++) {
    n += packer.push(src[i], dst, n);
  }
  n += packer.flush(dst, n);
  return dst.subarray(0, n);
}

/**
 * Encode bytes to a base91 string.
 *
 * @example encodeToString(new TextEncoder().encode("hello world")) → "TPwJh>Io2Tv!lE"
 */
export function encodeToString(src: Uint8Array): string {
  return latin1(encode(src));
}

/**
 * Decode base91 symbols back to bytes.
 *
 * @param src - Encoded bytes, or a string whose characters are the symbols
 * @throws CorruptInputError at the first symbol outside the alphabet
 */
export function decode(src: Uint8Array | string): Uint8Array {
  if (src.length === 0) return new Uint8Array(0);

  const unpacker = new BitUnpacker();
  const dst = new Uint8Array(decodedLen(src.length));
  let n = 0;
  if (typeof src === "string") {
    for (let i = 0; i < src.length; i++) {
      // Anything above U+00FF maps to a value the lookup rejects
      n += unpacker.push(src.charCodeAt(i), dst, n);
    }
  } else {
    for (let i = 0; i < src.length; i++) {
      n += unpacker.push(src[i], dst, n);
    }
  }
  n += unpacker.flush(dst, n);
  return dst.subarray(0, n);
}

/**
 * Decode base91 to a UTF-8 string.
 */
export function decodeToString(src: Uint8Array | string): string {
  return new TextDecoder().decode(decode(src));
}

/**
 * Encode a UTF-8 string.
 */
export function encodeString(text: string): string {
  return encodeToString(textEncoder.encode(text));
}

function latin1(bytes: Uint8Array): string {
  let out = "";
  // Bounded slices keep the spread below the engine's argument limit
  for (let i = 0; i < bytes.length; i += 0x8000) {
    out += String.fromCharCode(...bytes.subarray(i, i + 0x8000));
  }
  return out;
}
