/**
 * Runs one codec over a ByteSource into a ByteSink.
 *
 * Streaming codecs are driven chunk by chunk with bounded memory; the others
 * read the whole input before converting it.
 */

import { type ByteSink, type ByteSource, readAll } from "@basekit/base91";
import { type Codec, isStreaming } from "@basekit/encoding";

export type Direction = "encode" | "decode";

export type TranscodeOptions = {
  codec: Codec;
  direction: Direction;
  source: ByteSource;
  sink: ByteSink;
  /** Bytes read from the source per call */
  chunkSize: number;
  /** Append "\n" after encoded output */
  newline?: boolean;
  /** Drop CR and LF bytes from the input before decoding */
  ignoreNewlines?: boolean;
};

export type TranscodeStats = {
  bytesIn: number;
  bytesOut: number;
  streamed: boolean;
};

const LINE_BREAK = new Uint8Array([0x0a]);
const utf8Decoder = new TextDecoder();

export function transcode(options: TranscodeOptions): TranscodeStats {
  const { codec, direction, chunkSize } = options;
  const stats: TranscodeStats = { bytesIn: 0, bytesOut: 0, streamed: isStreaming(codec) };

  let source = countingSource(options.source, stats);
  const sink = countingSink(options.sink, stats);

  if (direction === "encode") {
    encodeInto(codec, source, sink, chunkSize);
    if (options.newline) sink.write(LINE_BREAK);
  } else {
    if (options.ignoreNewlines) source = skipLineBreaks(source);
    decodeInto(codec, source, sink, chunkSize);
  }
  return stats;
}

function encodeInto(codec: Codec, source: ByteSource, sink: ByteSink, chunkSize: number): void {
  if (!codec.createEncoder) {
    const text = codec.encode(readAll(source, chunkSize));
    if (text.length > 0) sink.write(utf8Bytes(text));
    return;
  }

  const encoder = codec.createEncoder(sink, { chunkSize });
  const buffer = new Uint8Array(chunkSize);
  for (;;) {
    const n = source.read(buffer);
    if (n === null) break;
    if (n > 0) encoder.write(buffer.subarray(0, n));
  }
  encoder.close();
}

function decodeInto(codec: Codec, source: ByteSource, sink: ByteSink, chunkSize: number): void {
  if (!codec.createDecoder) {
    const input = readAll(source, chunkSize);
    const bytes = codec.decode(codec.unicodeText ? utf8Decoder.decode(input) : latin1(input));
    if (bytes.length > 0) sink.write(bytes);
    return;
  }

  const decoder = codec.createDecoder(source, { chunkSize });
  const buffer = new Uint8Array(chunkSize);
  for (;;) {
    const n = decoder.read(buffer);
    if (n === null) break;
    if (n > 0) sink.write(buffer.subarray(0, n));
  }
}

/**
 * Wrap a source so CR and LF bytes never reach the decoder. Offsets in
 * decode errors then count only the bytes kept.
 */
export function skipLineBreaks(source: ByteSource): ByteSource {
  return {
    read: (buffer) => {
      for (;;) {
        const n = source.read(buffer);
        if (n === null) return null;
        let kept = 0;
        for (let i = 0; i < n; i++) {
          const b = buffer[i];
          if (b !== 0x0a && b !== 0x0d) buffer[kept++] = b;
        }
        if (kept > 0 || n === 0) return kept;
      }
    },
  };
}

function countingSource(source: ByteSource, stats: TranscodeStats): ByteSource {
  return {
    read: (buffer) => {
      const n = source.read(buffer);
      if (n !== null) stats.bytesIn += n;
      return n;
    },
  };
}

function countingSink(sink: ByteSink, stats: TranscodeStats): ByteSink {
  return {
    write: (chunk) => {
      const n = sink.write(chunk);
      stats.bytesOut += n;
      return n;
    },
  };
}

function utf8Bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

function latin1(bytes: Uint8Array): string {
  let out = "";
  for (let i = 0; i < bytes.length; i += 0x8000) {
    out += String.fromCharCode(...bytes.subarray(i, i + 0x8000));
  }
  return out;
}
