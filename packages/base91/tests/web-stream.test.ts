/**
 * WHATWG stream adapter tests
 */
import { describe, expect, it } from "vitest";
import { CorruptInputError } from "../src/errors.ts";
import { encodeToString } from "../src/std.ts";
import {
  bytesFromStream,
  createDecoderStream,
  createEncoderStream,
  streamFromBytes,
} from "../src/web-stream.ts";

const utf8 = (s: string) => new TextEncoder().encode(s);
const latin1 = (bytes: Uint8Array) => String.fromCharCode(...bytes);

function streamFromChunks(chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(chunk);
      controller.close();
    },
  });
}

describe("createEncoderStream", () => {
  it("should match one-shot output across chunk boundaries", async () => {
    const input = utf8("hello world");
    const chunks = [input.subarray(0, 1), input.subarray(1, 6), input.subarray(6)];
    const out = await bytesFromStream(streamFromChunks(chunks).pipeThrough(createEncoderStream()));
    expect(latin1(out)).toBe("TPwJh>Io2Tv!lE");
  });

  it("should emit nothing for an empty stream", async () => {
    const out = await bytesFromStream(streamFromChunks([]).pipeThrough(createEncoderStream()));
    expect(out).toEqual(new Uint8Array(0));
  });
});

describe("createDecoderStream", () => {
  it("should round trip through both transforms", async () => {
    const input = new Uint8Array(777);
    for (let i = 0; i < input.length; i++) input[i] = (i * 17) & 0xff;

    const out = await bytesFromStream(
      streamFromBytes(input).pipeThrough(createEncoderStream()).pipeThrough(createDecoderStream())
    );
    expect(out).toEqual(input);
  });

  it("should decode a lone trailing symbol split into its own chunk", async () => {
    const chunks = [utf8("lf"), utf8("B")];
    const out = await bytesFromStream(streamFromChunks(chunks).pipeThrough(createDecoderStream()));
    expect(out).toEqual(new Uint8Array([0x2a, 0x2b]));
  });

  it("should error the stream on a symbol outside the alphabet", async () => {
    const encoded = encodeToString(utf8("hello"));
    const corrupted = utf8(`${encoded.slice(0, 2)}-`);
    await expect(
      bytesFromStream(streamFromBytes(corrupted).pipeThrough(createDecoderStream()))
    ).rejects.toBeInstanceOf(CorruptInputError);
  });
});

describe("bytesFromStream", () => {
  it("should concatenate chunks", async () => {
    const out = await bytesFromStream(streamFromChunks([utf8("ab"), utf8("c")]));
    expect(out).toEqual(utf8("abc"));
  });
});
