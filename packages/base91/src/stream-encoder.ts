/**
 * Incremental base91 encoder writing to a ByteSink.
 *
 * Every `write` runs the packer over the new bytes immediately; the only
 * state carried between calls is the packer's bit queue (at most 13 bits)
 * and a fixed scratch buffer, so memory use does not grow with the input.
 * Output is byte-identical to `encode` over the concatenated chunks.
 */

import { EncoderClosedError, ShortWriteError, StreamWriteError } from "./errors.ts";
import type { ByteSink } from "./io.ts";
import { BitPacker } from "./packer.ts";

export const DEFAULT_BUFFER_SIZE = 1024;

export type StreamEncoderOptions = {
  /** Scratch buffer size in symbols; the sink sees writes of at most this size */
  bufferSize?: number;
};

type EncoderState = "open" | "closed" | "failed";

export class StreamEncoder {
  private readonly packer = new BitPacker();
  private readonly scratch: Uint8Array;
  private length = 0;
  private state: EncoderState = "open";
  // Error every later call rethrows once failed
  private failure: unknown;

  constructor(
    private readonly sink: ByteSink,
    options: StreamEncoderOptions = {}
  ) {
    const size = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
    if (!Number.isInteger(size) || size < 2) {
      throw new RangeError(`bufferSize must be an integer >= 2, got ${size}`);
    }
    this.scratch = new Uint8Array(size);
  }

  get closed(): boolean {
    return this.state !== "open";
  }

  /**
   * Encode `chunk` and pass the symbols to the sink.
   *
   * Returns `chunk.length`. If the sink fails part way the error is thrown as
   * a StreamWriteError whose `consumed` is still `chunk.length`, not the share
   * that reached the sink; the encoder is unusable afterwards.
   *
   * @throws EncoderClosedError after `close`
   * @throws StreamWriteError if the sink fails
   */
  write(chunk: Uint8Array): number {
    if (this.state === "failed") throw this.failure;
    if (this.state === "closed") throw new EncoderClosedError();
    if (chunk.length === 0) return 0;

    try {
      for (let i = 0; i < chunk.length; i++) {
        if (this.length + 2 > this.scratch.length) this.drain();
        this.length += this.packer.push(chunk[i], this.scratch, this.length);
      }
      this.drain();
    } catch (err) {
      const error = new StreamWriteError(chunk.length, err);
      this.fail(error);
      throw error;
    }
    return chunk.length;
  }

  /**
   * Write the trailing symbols. Sink errors are thrown unchanged. Closing a
   * closed encoder does nothing.
   */
  close(): void {
    if (this.state === "closed") return;
    if (this.state === "failed") throw this.failure;

    try {
      if (this.length + 2 > this.scratch.length) this.drain();
      this.length += this.packer.flush(this.scratch, this.length);
      this.drain();
    } catch (err) {
      this.fail(err);
      throw err;
    }
    this.state = "closed";
  }

  private drain(): void {
    if (this.length === 0) return;
    const expected = this.length;
    this.length = 0;
    const written = this.sink.write(this.scratch.subarray(0, expected));
    if (written < expected) throw new ShortWriteError(written, expected);
  }

  private fail(error: unknown): void {
    this.failure = error;
    this.state = "failed";
  }
}
