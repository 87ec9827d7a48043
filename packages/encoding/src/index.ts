/**
 * @basekit/encoding
 *
 * The binary-to-text codec family behind one registry.
 *
 * - Hex (base16) encode/decode
 * - RFC 4648 Base32 and Crockford Base32 (CB32)
 * - Base45 (RFC 9285)
 * - Base58 and Base62
 * - Base64 and Base64URL
 * - Base85 (ASCII85)
 * - base91, re-exported from `@basekit/base91`
 * - Base100 (one emoji per byte)
 *
 * Decoders throw `CorruptInputError` with the offset of the first bad
 * character.
 */

export { CorruptInputError } from "@basekit/base91";
export { base100Decode, base100Encode } from "./base100.ts";
export { base32Decode, base32Encode } from "./base32.ts";
export { base45Decode, base45Encode } from "./base45.ts";
export { base58Decode, base58Encode } from "./base58.ts";
export { base62Decode, base62Encode } from "./base62.ts";
export { base64Decode, base64Encode, base64urlDecode, base64urlEncode } from "./base64.ts";
export { base85Decode, base85Encode } from "./base85.ts";
export { decodeCB32, encodeCB32 } from "./crockford-base32.ts";
export { bytesToHex, hexToBytes } from "./hex.ts";
export {
  type ChunkDecoder,
  type ChunkEncoder,
  CODEC_NAMES,
  type Codec,
  type CodecName,
  CodecNameSchema,
  getCodec,
  isCodecName,
  isStreaming,
  listCodecs,
  type StreamOptions,
} from "./registry.ts";
