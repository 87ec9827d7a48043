/**
 * Named codec registry.
 *
 * Every member of the family is reachable by name with the same
 * bytes-to-text surface. Codecs that carry state across chunks also expose
 * stream constructors; the others only work on whole buffers.
 */

import {
  type ByteSink,
  type ByteSource,
  decode as base91Decode,
  encodeToString as base91Encode,
  StreamDecoder,
  StreamEncoder,
} from "@basekit/base91";
import { z } from "zod";
import { base100Decode, base100Encode } from "./base100.ts";
import { base32Decode, base32Encode } from "./base32.ts";
import { base45Decode, base45Encode } from "./base45.ts";
import { base58Decode, base58Encode } from "./base58.ts";
import { base62Decode, base62Encode } from "./base62.ts";
import { base64Decode, base64Encode, base64urlDecode, base64urlEncode } from "./base64.ts";
import { base85Decode, base85Encode } from "./base85.ts";
import { decodeCB32, encodeCB32 } from "./crockford-base32.ts";
import { bytesToHex, hexToBytes } from "./hex.ts";

export const CODEC_NAMES = [
  "hex",
  "base32",
  "crockford32",
  "base45",
  "base58",
  "base62",
  "base64",
  "base64url",
  "base85",
  "base91",
  "base100",
] as const;

export const CodecNameSchema = z.enum(CODEC_NAMES);
export type CodecName = z.infer<typeof CodecNameSchema>;

export type ChunkEncoder = {
  write: (chunk: Uint8Array) => number;
  close: () => void;
};

export type ChunkDecoder = {
  read: (buffer: Uint8Array) => number | null;
};

export type StreamOptions = {
  /** Encoder scratch buffer / decoder read chunk, in bytes */
  chunkSize?: number;
};

export type Codec = {
  name: CodecName;
  /** Alphabet size */
  radix: number;
  description: string;
  /** Encoded text goes beyond ASCII and is carried as UTF-8 */
  unicodeText?: boolean;
  encode: (bytes: Uint8Array) => string;
  /** @throws CorruptInputError */
  decode: (text: string) => Uint8Array;
  createEncoder?: (sink: ByteSink, options?: StreamOptions) => ChunkEncoder;
  createDecoder?: (source: ByteSource, options?: StreamOptions) => ChunkDecoder;
};

const CODECS: Record<CodecName, Codec> = {
  hex: {
    name: "hex",
    radix: 16,
    description: "Base16, lowercase",
    encode: bytesToHex,
    decode: hexToBytes,
  },
  base32: {
    name: "base32",
    radix: 32,
    description: "RFC 4648 Base32, padded",
    encode: base32Encode,
    decode: base32Decode,
  },
  crockford32: {
    name: "crockford32",
    radix: 32,
    description: "Crockford Base32, unpadded, case-insensitive",
    encode: encodeCB32,
    decode: decodeCB32,
  },
  base45: {
    name: "base45",
    radix: 45,
    description: "RFC 9285 Base45, 2 bytes to 3 characters",
    encode: base45Encode,
    decode: base45Decode,
  },
  base58: {
    name: "base58",
    radix: 58,
    description: "Base58 big-integer radix, Bitcoin alphabet",
    encode: base58Encode,
    decode: base58Decode,
  },
  base62: {
    name: "base62",
    radix: 62,
    description: "Base62 big-integer radix",
    encode: base62Encode,
    decode: base62Decode,
  },
  base64: {
    name: "base64",
    radix: 64,
    description: "RFC 4648 Base64, padded",
    encode: base64Encode,
    decode: base64Decode,
  },
  base64url: {
    name: "base64url",
    radix: 64,
    description: "RFC 4648 Base64URL, unpadded",
    encode: base64urlEncode,
    decode: base64urlDecode,
  },
  base85: {
    name: "base85",
    radix: 85,
    description: "ASCII85, 4 bytes to 5 characters, z for zero groups",
    encode: base85Encode,
    decode: base85Decode,
  },
  base91: {
    name: "base91",
    radix: 91,
    description: "basE91 variable-width bit packing, streaming",
    encode: base91Encode,
    decode: base91Decode,
    createEncoder: (sink, options) => new StreamEncoder(sink, { bufferSize: options?.chunkSize }),
    createDecoder: (source, options) =>
      new StreamDecoder(source, { chunkSize: options?.chunkSize }),
  },
  base100: {
    name: "base100",
    radix: 256,
    description: "One emoji per byte",
    unicodeText: true,
    encode: base100Encode,
    decode: base100Decode,
  },
};

export function isCodecName(name: string): name is CodecName {
  return CodecNameSchema.safeParse(name).success;
}

/**
 * Look up a codec by name.
 *
 * @throws Error listing the known names if `name` is not one
 */
export function getCodec(name: string): Codec {
  if (!isCodecName(name)) {
    throw new Error(`Unknown codec "${name}". Known codecs: ${CODEC_NAMES.join(", ")}`);
  }
  return CODECS[name];
}

/**
 * All codecs, ordered by radix.
 */
export function listCodecs(): Codec[] {
  return CODEC_NAMES.map((name) => CODECS[name]);
}

export function isStreaming(codec: Codec): boolean {
  return codec.createEncoder !== undefined && codec.createDecoder !== undefined;
}
