/**
 * Base64 encoding/decoding (RFC 4648)
 *
 * - Standard alphabet with `=` padding (Section 4)
 * - URL-safe variant: + becomes -, / becomes _, no padding (Section 5)
 */

import { CorruptInputError } from "@basekit/base91";

const STD_CHARS = /[A-Za-z0-9+/]/;
const URL_CHARS = /[A-Za-z0-9\-_]/;

/**
 * Encode bytes to padded standard Base64.
 */
export function base64Encode(bytes: Uint8Array): string {
  let binary = "";
  for (let i = 0; i < bytes.length; i += 0x8000) {
    binary += String.fromCharCode(...bytes.subarray(i, i + 0x8000));
  }
  return btoa(binary);
}

/**
 * Decode padded standard Base64.
 *
 * @throws CorruptInputError at the first character outside the alphabet or
 *   at misplaced padding
 */
export function base64Decode(str: string): Uint8Array {
  validate(str, STD_CHARS, "base64", true);
  return fromBinary(atob(str));
}

/**
 * Encode bytes to Base64URL string (no padding).
 */
export function base64urlEncode(bytes: Uint8Array): string {
  return base64Encode(bytes).replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/, "");
}

/**
 * Decode Base64URL string (padding optional).
 */
export function base64urlDecode(str: string): Uint8Array {
  validate(str, URL_CHARS, "base64url", false);

  // Restore standard Base64: replace - with +, _ with /
  let base64 = str.replace(/=+$/, "").replace(/-/g, "+").replace(/_/g, "/");

  // Re-add padding
  const pad = base64.length % 4;
  if (pad === 2) base64 += "==";
  else if (pad === 3) base64 += "=";

  return fromBinary(atob(base64));
}

function validate(str: string, chars: RegExp, codec: string, padded: boolean): void {
  let end = str.length;
  while (end > 0 && str[end - 1] === "=") end--;

  const padding = str.length - end;
  if (padding > 2) throw new CorruptInputError(codec, end);

  for (let i = 0; i < end; i++) {
    if (!chars.test(str[i])) throw new CorruptInputError(codec, i);
  }

  if (end % 4 === 1) throw new CorruptInputError(codec, end - 1);
  if (padded && str.length % 4 !== 0) throw new CorruptInputError(codec, str.length);
}

function fromBinary(binary: string): Uint8Array {
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}
