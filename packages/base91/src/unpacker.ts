/**
 * base91 decode core.
 *
 * Symbols are read in pairs. Each pair is one value `lo + hi * 91` that
 * carried 13 or 14 bits, decided by the same threshold the packer uses.
 * Complete bytes are taken off the low end of the bit queue.
 */

import { RADIX, stdAlphabet, type Alphabet } from "./alphabet.ts";
import { CorruptInputError } from "./errors.ts";

const MASK_13 = 0x1fff;
const THRESHOLD = 88;

export class BitUnpacker {
  private queue = 0;
  private numBits = 0;
  // First symbol of an incomplete pair
  private pending: number | undefined;
  private consumed = 0;

  constructor(private readonly alphabet: Alphabet = stdAlphabet) {}

  /** Offset of the next symbol, counted over everything pushed so far */
  get position(): number {
    return this.consumed;
  }

  /**
   * Append one symbol byte. Writes 0, 1 or 2 bytes to `dst` at `offset` and
   * returns how many were written; `dst` needs room for 2.
   *
   * @throws CorruptInputError if the symbol is not in the alphabet
   */
  push(symbol: number, dst: Uint8Array, offset: number): number {
    const digit = this.alphabet.lookup(symbol);
    if (digit === undefined) {
      throw new CorruptInputError("base91", this.consumed);
    }
    this.consumed++;

    if (this.pending === undefined) {
      this.pending = digit;
      return 0;
    }

    const value = this.pending + digit * RADIX;
    this.pending = undefined;
    this.queue |= value << this.numBits;
    this.numBits += (value & MASK_13) > THRESHOLD ? 13 : 14;

    let n = 0;
    while (this.numBits > 7) {
      dst[offset + n++] = this.queue & 0xff;
      this.queue >>>= 8;
      this.numBits -= 8;
    }
    return n;
  }

  /**
   * End of input. A lone trailing symbol becomes exactly one more byte;
   * returns the number of bytes written (0 or 1).
   */
  flush(dst: Uint8Array, offset: number): number {
    let n = 0;
    if (this.pending !== undefined) {
      dst[offset] = (this.queue | (this.pending << this.numBits)) & 0xff;
      n = 1;
    }

    this.queue = 0;
    this.numBits = 0;
    this.pending = undefined;
    return n;
  }
}
