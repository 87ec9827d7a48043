/**
 * base91 encode core.
 *
 * Bytes are appended to a bit queue, low bits first. Whenever the queue holds
 * more than 13 bits, 13 or 14 of them are taken and written as two symbols
 * (low digit first). A 13-bit window above 88 is taken as is; otherwise the
 * 14-bit window is taken, which stays below 91 * 91 = 8281.
 */

import { RADIX, stdAlphabet, type Alphabet } from "./alphabet.ts";

const MASK_13 = 0x1fff;
const MASK_14 = 0x3fff;
const THRESHOLD = 88;

export class BitPacker {
  private queue = 0;
  private numBits = 0;

  constructor(private readonly alphabet: Alphabet = stdAlphabet) {}

  /** Bits held between calls (0..13) */
  get pendingBits(): number {
    return this.numBits;
  }

  /**
   * Append one byte. Writes 0 or 2 symbols to `dst` at `offset` and returns
   * how many were written; `dst` needs room for 2.
   */
  push(byte: number, dst: Uint8Array, offset: number): number {
    this.queue |= (byte & 0xff) << this.numBits;
    this.numBits += 8;
    if (this.numBits <= 13) return 0;

    let value = this.queue & MASK_13;
    if (value > THRESHOLD) {
      this.queue >>>= 13;
      this.numBits -= 13;
    } else {
      value = this.queue & MASK_14;
      this.queue >>>= 14;
      this.numBits -= 14;
    }
    dst[offset] = this.alphabet.symbolAt(value % RADIX);
    dst[offset + 1] = this.alphabet.symbolAt(Math.floor(value / RADIX));
    return 2;
  }

  /**
   * Drain leftover bits as one or two trailing symbols. Returns the number of
   * symbols written (0 when the queue is empty).
   */
  flush(dst: Uint8Array, offset: number): number {
    if (this.numBits === 0) return 0;

    let n = 0;
    dst[offset + n++] = this.alphabet.symbolAt(this.queue % RADIX);
    if (this.numBits > 7 || this.queue > RADIX - 1) {
      dst[offset + n++] = this.alphabet.symbolAt(Math.floor(this.queue / RADIX));
    }

    this.queue = 0;
    this.numBits = 0;
    return n;
  }
}
