/**
 * StreamDecoder tests
 */
import { describe, expect, it } from "vitest";
import { CorruptInputError } from "../src/errors.ts";
import { createBytesSource, readAll, type ByteSource } from "../src/io.ts";
import { decode, encode } from "../src/std.ts";
import { StreamDecoder } from "../src/stream-decoder.ts";

const utf8 = (s: string) => new TextEncoder().encode(s);

function readWith(decoder: StreamDecoder, size: number): Uint8Array {
  const buffer = new Uint8Array(size);
  const out: number[] = [];
  for (;;) {
    const n = decoder.read(buffer);
    if (n === null) break;
    out.push(...buffer.subarray(0, n));
  }
  return new Uint8Array(out);
}

describe("StreamDecoder", () => {
  it("should decode a whole stream", () => {
    const decoder = new StreamDecoder(createBytesSource("TPwJh>Io2Tv!lE"));
    expect(readAll(decoder)).toEqual(utf8("hello world"));
  });

  it("should match one-shot output for any chunk, source and buffer size", () => {
    const input = new Uint8Array(2500);
    for (let i = 0; i < input.length; i++) input[i] = (i * 131 + 7) & 0xff;
    const encoded = encode(input);
    const expected = decode(encoded);

    for (const chunkSize of [1, 2, 3, 7, 64, 1024]) {
      for (const maxRead of [1, 5, 1000]) {
        for (const bufferSize of [1, 3, 4096]) {
          const source = createBytesSource(encoded, { maxRead });
          const decoder = new StreamDecoder(source, { chunkSize });
          expect(readWith(decoder, bufferSize)).toEqual(expected);
        }
      }
    }
  });

  it("should flush a lone trailing symbol into one byte", () => {
    const decoder = new StreamDecoder(createBytesSource("lfB"), { chunkSize: 1 });
    const buffer = new Uint8Array(8);

    expect(decoder.read(buffer)).toBe(1);
    expect(buffer[0]).toBe(0x2a);
    expect(decoder.read(buffer)).toBe(1);
    expect(buffer[0]).toBe(0x2b);
    expect(decoder.read(buffer)).toBeNull();
  });

  it("should keep reporting end of stream", () => {
    const decoder = new StreamDecoder(createBytesSource(""));
    const buffer = new Uint8Array(8);
    expect(decoder.read(buffer)).toBeNull();
    expect(decoder.read(buffer)).toBeNull();
  });

  it("should return 0 for an empty buffer", () => {
    const decoder = new StreamDecoder(createBytesSource("qA"));
    expect(decoder.read(new Uint8Array(0))).toBe(0);
    expect(readAll(decoder)).toEqual(new Uint8Array([0x2a]));
  });

  it("should return 0 when the source yields nothing yet", () => {
    let calls = 0;
    const source: ByteSource = {
      read: (buffer) => {
        calls++;
        if (calls === 1) return 0;
        if (calls === 2) {
          buffer.set(utf8("qA"));
          return 2;
        }
        return null;
      },
    };
    const decoder = new StreamDecoder(source);
    const buffer = new Uint8Array(4);
    expect(decoder.read(buffer)).toBe(0);
    expect(decoder.read(buffer)).toBe(1);
    expect(buffer[0]).toBe(0x2a);
    expect(decoder.read(buffer)).toBeNull();
  });

  it("should reject a source that overfills the chunk", () => {
    const source: ByteSource = { read: (buffer) => buffer.length + 1 };
    const decoder = new StreamDecoder(source, { chunkSize: 4 });
    expect(() => decoder.read(new Uint8Array(4))).toThrow(RangeError);
  });

  it("should pass source errors through unchanged", () => {
    const failure = new Error("connection reset");
    const source: ByteSource = {
      read: () => {
        throw failure;
      },
    };
    const decoder = new StreamDecoder(source);
    expect(() => decoder.read(new Uint8Array(4))).toThrow(failure);
  });

  it("should reject a chunk size below 1", () => {
    expect(() => new StreamDecoder(createBytesSource(""), { chunkSize: 0 })).toThrow(RangeError);
  });

  describe("corrupt input", () => {
    it("should fail at the absolute offset of the bad symbol", () => {
      const source = createBytesSource("TPw Jh>Io2Tv!lE", { maxRead: 2 });
      const decoder = new StreamDecoder(source, { chunkSize: 2 });
      const buffer = new Uint8Array(16);

      // "TP" completes one pair and one byte
      expect(decoder.read(buffer)).toBe(1);
      expect(buffer[0]).toBe(0x68);

      let caught: unknown;
      try {
        decoder.read(buffer);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(CorruptInputError);
      if (caught instanceof CorruptInputError) {
        expect(caught.position).toBe(3);
      }
    });

    it("should keep failing after a data error", () => {
      const decoder = new StreamDecoder(createBytesSource("AA-AA"));
      const buffer = new Uint8Array(16);
      expect(() => decoder.read(buffer)).toThrow("base91: illegal data at input byte 2");
      expect(() => decoder.read(buffer)).toThrow(CorruptInputError);
    });
  });
});
