/**
 * Synchronous byte sink/source capabilities used by the stream codecs, plus
 * in-memory implementations.
 */

/**
 * Downstream of an encoder.
 *
 * `write` returns how many bytes it accepted; anything short of
 * `chunk.length` is a short write. The chunk is only valid for the duration
 * of the call, so a sink that keeps data must copy it.
 */
export type ByteSink = {
  write: (chunk: Uint8Array) => number;
};

/**
 * Upstream of a decoder.
 *
 * `read` fills `buffer` from the front and returns the byte count, or null
 * once the source is exhausted.
 */
export type ByteSource = {
  read: (buffer: Uint8Array) => number | null;
};

export type BufferSink = ByteSink & {
  /** Everything written so far */
  bytes: () => Uint8Array;
  /** Everything written so far, as latin1 text */
  text: () => string;
  /** Number of write calls received */
  readonly writes: number;
};

export type BufferSinkConfig = {
  /** Throw on every write after this many successful ones */
  failAfter?: number;
  /** Error thrown once `failAfter` is reached */
  failure?: Error;
};

/**
 * Create a sink that collects everything written to it.
 */
export const createBufferSink = (config: BufferSinkConfig = {}): BufferSink => {
  const chunks: Uint8Array[] = [];
  let writes = 0;

  return {
    write: (chunk) => {
      if (config.failAfter !== undefined && writes >= config.failAfter) {
        writes++;
        throw config.failure ?? new Error("sink closed");
      }
      writes++;
      chunks.push(chunk.slice());
      return chunk.length;
    },
    bytes: () => concatBytes(chunks),
    text: () => {
      let out = "";
      for (const c of chunks) {
        for (let i = 0; i < c.length; i++) out += String.fromCharCode(c[i]);
      }
      return out;
    },
    get writes() {
      return writes;
    },
  };
};

export type BytesSourceConfig = {
  /** Largest count a single read returns (default: unlimited) */
  maxRead?: number;
};

/**
 * Create a source serving `bytes`, then end of stream.
 */
export const createBytesSource = (
  bytes: Uint8Array | string,
  config: BytesSourceConfig = {}
): ByteSource => {
  const data = typeof bytes === "string" ? latin1Bytes(bytes) : bytes;
  let offset = 0;

  return {
    read: (buffer) => {
      if (offset >= data.length) return null;
      const limit = Math.min(buffer.length, config.maxRead ?? buffer.length);
      const n = Math.min(limit, data.length - offset);
      buffer.set(data.subarray(offset, offset + n));
      offset += n;
      return n;
    },
  };
};

/**
 * Drain a source into a single buffer.
 */
export function readAll(source: ByteSource, chunkSize = 64 * 1024): Uint8Array {
  const buffer = new Uint8Array(chunkSize);
  const chunks: Uint8Array[] = [];
  for (;;) {
    const n = source.read(buffer);
    if (n === null) break;
    if (n > 0) chunks.push(buffer.slice(0, n));
  }
  return concatBytes(chunks);
}

export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  if (chunks.length === 0) return new Uint8Array(0);
  if (chunks.length === 1) return chunks[0];
  let total = 0;
  for (const c of chunks) total += c.length;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.length;
  }
  return out;
}

function latin1Bytes(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > 0xff) throw new RangeError(`character at ${i} is outside latin1`);
    out[i] = code;
  }
  return out;
}
