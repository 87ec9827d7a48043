/**
 * base91 alphabet and lookup tables.
 *
 * The standard alphabet is the 95 printable ASCII characters minus space,
 * apostrophe, hyphen and backslash. Symbol order is part of the wire format:
 * changing it breaks every previously encoded string.
 */

import { AlphabetError } from "./errors.ts";

export const STD_ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789!#$%&()*+,./:;<=>?@[]^_`{|}~"';

/** Number of symbols, i.e. the radix */
export const RADIX = 91;

// Reverse-table entry for bytes outside the alphabet
const INVALID = 0xff;

/**
 * Bidirectional symbol <-> value mapping.
 *
 * Both tables are filled by the constructor and never written afterwards.
 */
export class Alphabet {
  private readonly encodeMap: Uint8Array;
  private readonly decodeMap: Uint8Array;

  constructor(readonly symbols: string) {
    if (symbols.length !== RADIX) {
      throw new AlphabetError(
        `invalid alphabet, the alphabet length must be ${RADIX}, got ${symbols.length}`
      );
    }

    this.encodeMap = new Uint8Array(RADIX);
    this.decodeMap = new Uint8Array(256).fill(INVALID);

    for (let i = 0; i < RADIX; i++) {
      const code = symbols.charCodeAt(i);
      if (code < 0x21 || code > 0x7e) {
        throw new AlphabetError(`invalid alphabet, non-printable symbol at index ${i}`);
      }
      if (this.decodeMap[code] !== INVALID) {
        throw new AlphabetError(`invalid alphabet, duplicate symbol "${symbols[i]}"`);
      }
      this.encodeMap[i] = code;
      this.decodeMap[code] = i;
    }
  }

  /** Symbol byte for a value in 0..90 */
  symbolAt(value: number): number {
    return this.encodeMap[value];
  }

  /** Value of a symbol byte, or undefined when the byte is not in the alphabet */
  lookup(byte: number): number | undefined {
    if (byte < 0 || byte > 0xff) return undefined;
    const value = this.decodeMap[byte];
    return value === INVALID ? undefined : value;
  }

  has(byte: number): boolean {
    return this.lookup(byte) !== undefined;
  }
}

export const stdAlphabet = new Alphabet(STD_ALPHABET);
