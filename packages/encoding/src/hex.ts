/**
 * Hex (base16) encoding/decoding
 */

import { CorruptInputError } from "@basekit/base91";

const HEX_DIGITS = "0123456789abcdef";

/**
 * Convert bytes to hex string.
 *
 * @returns Lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    out += HEX_DIGITS[b >> 4] + HEX_DIGITS[b & 0x0f];
  }
  return out;
}

/**
 * Convert hex string to bytes. Either case is accepted.
 *
 * @throws CorruptInputError at the first non-hex character, or at the last
 *   character of an odd-length string
 */
export function hexToBytes(hex: string): Uint8Array {
  const bytes = new Uint8Array(hex.length >> 1);
  for (let i = 0; i < bytes.length; i++) {
    const hi = nibble(hex.charCodeAt(i * 2));
    if (hi < 0) throw new CorruptInputError("hex", i * 2);
    const lo = nibble(hex.charCodeAt(i * 2 + 1));
    if (lo < 0) throw new CorruptInputError("hex", i * 2 + 1);
    bytes[i] = (hi << 4) | lo;
  }

  if (hex.length % 2 !== 0) {
    throw new CorruptInputError("hex", hex.length - 1);
  }
  return bytes;
}

function nibble(code: number): number {
  if (code >= 0x30 && code <= 0x39) return code - 0x30; // 0-9
  if (code >= 0x61 && code <= 0x66) return code - 0x57; // a-f
  if (code >= 0x41 && code <= 0x46) return code - 0x37; // A-F
  return -1;
}
