/**
 * transcode tests with in-memory sinks and sources
 */
import {
  CorruptInputError,
  createBufferSink,
  createBytesSource,
  encodeToString,
  readAll,
} from "@basekit/base91";
import { getCodec } from "@basekit/encoding";
import { describe, expect, it } from "vitest";
import { skipLineBreaks, transcode } from "../src/lib/transcode";

const utf8 = (s: string) => new TextEncoder().encode(s);

describe("transcode", () => {
  it("should stream base91 encoding", () => {
    const sink = createBufferSink();
    const stats = transcode({
      codec: getCodec("base91"),
      direction: "encode",
      source: createBytesSource(utf8("hello world"), { maxRead: 4 }),
      sink,
      chunkSize: 16,
    });

    expect(sink.text()).toBe("TPwJh>Io2Tv!lE");
    expect(stats).toEqual({ bytesIn: 11, bytesOut: 14, streamed: true });
  });

  it("should append a line break when asked", () => {
    const sink = createBufferSink();
    const stats = transcode({
      codec: getCodec("base91"),
      direction: "encode",
      source: createBytesSource(utf8("hello world")),
      sink,
      chunkSize: 16,
      newline: true,
    });

    expect(sink.text()).toBe("TPwJh>Io2Tv!lE\n");
    expect(stats.bytesOut).toBe(15);
  });

  it("should stream base91 decoding with line breaks skipped", () => {
    const sink = createBufferSink();
    const stats = transcode({
      codec: getCodec("base91"),
      direction: "decode",
      source: createBytesSource("TPwJh>Io2\nTv!lE\r\n", { maxRead: 3 }),
      sink,
      chunkSize: 16,
      ignoreNewlines: true,
    });

    expect(sink.text()).toBe("hello world");
    expect(stats).toEqual({ bytesIn: 17, bytesOut: 11, streamed: true });
  });

  it("should reject a trailing line break unless skipped", () => {
    expect(() =>
      transcode({
        codec: getCodec("base91"),
        direction: "decode",
        source: createBytesSource("TPwJh>Io2Tv!lE\n"),
        sink: createBufferSink(),
        chunkSize: 16,
      })
    ).toThrow(CorruptInputError);
  });

  it("should match one-shot base91 output for large input", () => {
    const input = new Uint8Array(5000);
    for (let i = 0; i < input.length; i++) input[i] = (i * 251 + 17) & 0xff;

    const encoded = createBufferSink();
    transcode({
      codec: getCodec("base91"),
      direction: "encode",
      source: createBytesSource(input, { maxRead: 333 }),
      sink: encoded,
      chunkSize: 64,
    });
    expect(encoded.text()).toBe(encodeToString(input));

    const decoded = createBufferSink();
    transcode({
      codec: getCodec("base91"),
      direction: "decode",
      source: createBytesSource(encoded.bytes(), { maxRead: 100 }),
      sink: decoded,
      chunkSize: 64,
    });
    expect(decoded.bytes()).toEqual(input);
  });

  it("should encode whole buffers for non-streaming codecs", () => {
    const sink = createBufferSink();
    const stats = transcode({
      codec: getCodec("hex"),
      direction: "encode",
      source: createBytesSource(utf8("hello world"), { maxRead: 2 }),
      sink,
      chunkSize: 16,
    });

    expect(sink.text()).toBe("68656c6c6f20776f726c64");
    expect(stats).toEqual({ bytesIn: 11, bytesOut: 22, streamed: false });
  });

  it("should decode whole buffers for non-streaming codecs", () => {
    const sink = createBufferSink();
    transcode({
      codec: getCodec("base64"),
      direction: "decode",
      source: createBytesSource("aGVsbG8gd29ybGQ=\n"),
      sink,
      chunkSize: 16,
      ignoreNewlines: true,
    });

    expect(sink.text()).toBe("hello world");
  });

  it("should carry emoji output as UTF-8 both ways", () => {
    const encoded = createBufferSink();
    const stats = transcode({
      codec: getCodec("base100"),
      direction: "encode",
      source: createBytesSource(utf8("hi")),
      sink: encoded,
      chunkSize: 16,
    });
    expect(encoded.bytes()).toEqual(utf8("\u{1F45F}\u{1F460}"));
    expect(stats.bytesOut).toBe(8);

    const decoded = createBufferSink();
    transcode({
      codec: getCodec("base100"),
      direction: "decode",
      source: createBytesSource(encoded.bytes(), { maxRead: 3 }),
      sink: decoded,
      chunkSize: 16,
    });
    expect(decoded.text()).toBe("hi");
  });

  it("should decode base85 with embedded line breaks", () => {
    const sink = createBufferSink();
    transcode({
      codec: getCodec("base85"),
      direction: "decode",
      source: createBytesSource("BOu!rD]j7\nBEbo7\n"),
      sink,
      chunkSize: 16,
    });
    expect(sink.text()).toBe("hello world");
  });

  it("should write nothing for empty input", () => {
    const sink = createBufferSink();
    const stats = transcode({
      codec: getCodec("base62"),
      direction: "encode",
      source: createBytesSource(""),
      sink,
      chunkSize: 16,
    });

    expect(sink.writes).toBe(0);
    expect(stats).toEqual({ bytesIn: 0, bytesOut: 0, streamed: false });
  });
});

describe("skipLineBreaks", () => {
  it("should drop CR and LF bytes", () => {
    const source = skipLineBreaks(createBytesSource("ab\r\ncd\n", { maxRead: 3 }));
    expect(readAll(source)).toEqual(utf8("abcd"));
  });

  it("should reach end of stream through line-break-only reads", () => {
    const source = skipLineBreaks(createBytesSource("\n\n"));
    expect(source.read(new Uint8Array(4))).toBeNull();
  });
});
