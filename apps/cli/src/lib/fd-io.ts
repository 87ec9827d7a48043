/**
 * Synchronous file-descriptor sinks and sources for the stream codecs.
 */

import * as fs from "node:fs";
import type { ByteSink, ByteSource } from "@basekit/base91";
import { resolvePath } from "./config";

export const STDIN_FD = 0;
export const STDOUT_FD = 1;

export function fdSource(fd: number): ByteSource {
  return {
    read: (buffer) => {
      try {
        const n = fs.readSync(fd, buffer, 0, buffer.length, null);
        return n === 0 ? null : n;
      } catch (err) {
        // Windows reports a closed pipe as EOF
        if (isErrnoException(err) && err.code === "EOF") return null;
        throw err;
      }
    },
  };
}

export function fdSink(fd: number): ByteSink {
  return {
    write: (chunk) => {
      let offset = 0;
      while (offset < chunk.length) {
        offset += fs.writeSync(fd, chunk, offset, chunk.length - offset);
      }
      return offset;
    },
  };
}

export type FileHandle = {
  fd: number;
  close: () => void;
};

/**
 * Open `file` for reading, or stdin when no file is given.
 */
export function openInput(file?: string): FileHandle {
  if (!file || file === "-") return { fd: STDIN_FD, close: () => {} };
  const fd = fs.openSync(resolvePath(file), "r");
  return { fd, close: () => fs.closeSync(fd) };
}

/**
 * Open `file` for writing (truncating), or stdout when no file is given.
 */
export function openOutput(file?: string): FileHandle {
  if (!file || file === "-") return { fd: STDOUT_FD, close: () => {} };
  const fd = fs.openSync(resolvePath(file), "w");
  return { fd, close: () => fs.closeSync(fd) };
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
