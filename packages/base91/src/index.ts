/**
 * @basekit/base91
 *
 * base91 binary-to-text codec with true incremental streaming.
 *
 * - One-shot encode/decode over whole buffers
 * - StreamEncoder (write/close over a ByteSink)
 * - StreamDecoder (read over a ByteSource)
 * - WHATWG TransformStream adapters
 *
 * Every form produces the same bytes for the same input, however it is
 * split into chunks.
 */

// Alphabet
export { Alphabet, RADIX, STD_ALPHABET, stdAlphabet } from "./alphabet.ts";
// Errors
export {
  AlphabetError,
  CodecError,
  CorruptInputError,
  EncoderClosedError,
  ShortWriteError,
  StreamWriteError,
} from "./errors.ts";
// I/O capabilities
export {
  type BufferSink,
  type BufferSinkConfig,
  type ByteSink,
  type ByteSource,
  type BytesSourceConfig,
  concatBytes,
  createBufferSink,
  createBytesSource,
  readAll,
} from "./io.ts";
// Codec cores
export { BitPacker } from "./packer.ts";
export { BitUnpacker } from "./unpacker.ts";
// One-shot
export {
  decode,
  decodedLen,
  decodeToString,
  encode,
  encodedLen,
  encodeString,
  encodeToString,
} from "./std.ts";
// Streaming
export {
  DEFAULT_CHUNK_SIZE,
  StreamDecoder,
  type StreamDecoderOptions,
} from "./stream-decoder.ts";
export {
  DEFAULT_BUFFER_SIZE,
  StreamEncoder,
  type StreamEncoderOptions,
} from "./stream-encoder.ts";
export {
  bytesFromStream,
  createDecoderStream,
  createEncoderStream,
  streamFromBytes,
} from "./web-stream.ts";
