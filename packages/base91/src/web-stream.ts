/**
 * WHATWG stream adapters for the base91 codec (ReadableStream<Uint8Array>).
 */

import { concatBytes } from "./io.ts";
import { BitPacker } from "./packer.ts";
import { BitUnpacker } from "./unpacker.ts";

/**
 * TransformStream turning raw bytes into base91 symbols.
 */
export function createEncoderStream(): TransformStream<Uint8Array, Uint8Array> {
  const packer = new BitPacker();

  return new TransformStream({
    transform(chunk, controller) {
      // At most 13 carried bits plus the chunk, two symbols per 13 bits
      const out = new Uint8Array(2 * Math.floor((13 + chunk.length * 8) / 13) + 2);
      let n = 0;
      for (let i = 0; i < chunk.length; i++) {
        n += packer.push(chunk[i], out, n);
      }
      if (n > 0) controller.enqueue(out.subarray(0, n));
    },
    flush(controller) {
      const out = new Uint8Array(2);
      const n = packer.flush(out, 0);
      if (n > 0) controller.enqueue(out.subarray(0, n));
    },
  });
}

/**
 * TransformStream turning base91 symbols back into bytes. An invalid symbol
 * errors the stream with CorruptInputError.
 */
export function createDecoderStream(): TransformStream<Uint8Array, Uint8Array> {
  const unpacker = new BitUnpacker();

  return new TransformStream({
    transform(chunk, controller) {
      const out = new Uint8Array(Math.ceil(((chunk.length + 1) * 14) / 16) + 2);
      let n = 0;
      for (let i = 0; i < chunk.length; i++) {
        n += unpacker.push(chunk[i], out, n);
      }
      if (n > 0) controller.enqueue(out.subarray(0, n));
    },
    flush(controller) {
      const out = new Uint8Array(1);
      const n = unpacker.flush(out, 0);
      if (n > 0) controller.enqueue(out);
    },
  });
}

export function streamFromBytes(bytes: Uint8Array): ReadableStream<Uint8Array> {
  return new ReadableStream({
    start(controller) {
      if (bytes.length > 0) controller.enqueue(bytes);
      controller.close();
    },
  });
}

export async function bytesFromStream(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value) chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  return concatBytes(chunks);
}
