/**
 * Incremental base91 decoder reading from a ByteSource.
 *
 * Symbols are pulled in fixed-size chunks into a buffer owned by the decoder.
 * The unpacker keeps its state across chunks, so a symbol pair split between
 * two source reads decodes the same as in one piece.
 */

import type { ByteSource } from "./io.ts";
import { decodedLen } from "./std.ts";
import { BitUnpacker } from "./unpacker.ts";

export const DEFAULT_CHUNK_SIZE = 1024;

export type StreamDecoderOptions = {
  /** Symbols requested from the source per read */
  chunkSize?: number;
};

export class StreamDecoder {
  private readonly unpacker = new BitUnpacker();
  private readonly input: Uint8Array;
  private readonly output: Uint8Array;
  private start = 0;
  private end = 0;
  private eof = false;
  private failure: Error | undefined;

  constructor(
    private readonly source: ByteSource,
    options: StreamDecoderOptions = {}
  ) {
    const size = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${size}`);
    }
    this.input = new Uint8Array(size);
    // A carried first symbol can complete one extra pair
    this.output = new Uint8Array(decodedLen(size + 1) + 1);
  }

  /**
   * Fill `buffer` with decoded bytes.
   *
   * Returns the count copied, or null at end of stream. A source read of
   * zero bytes returns 0.
   *
   * @throws CorruptInputError at the first symbol outside the alphabet;
   *   later reads throw it again
   */
  read(buffer: Uint8Array): number | null {
    if (this.failure) throw this.failure;
    if (buffer.length === 0) return 0;

    for (;;) {
      if (this.start < this.end) {
        const n = Math.min(buffer.length, this.end - this.start);
        buffer.set(this.output.subarray(this.start, this.start + n));
        this.start += n;
        return n;
      }
      if (this.eof) return null;

      const count = this.source.read(this.input);
      this.start = 0;
      this.end = 0;

      if (count === null) {
        this.eof = true;
        this.end = this.unpacker.flush(this.output, 0);
        continue;
      }
      if (!Number.isInteger(count) || count < 0 || count > this.input.length) {
        throw new RangeError(`source returned invalid count ${count}`);
      }
      if (count === 0) return 0;

      try {
        for (let i = 0; i < count; i++) {
          this.end += this.unpacker.push(this.input[i], this.output, this.end);
        }
      } catch (err) {
        this.failure = err instanceof Error ? err : new Error(String(err));
        throw err;
      }
    }
  }
}
