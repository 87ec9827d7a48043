/**
 * Error types shared by every codec in the family.
 *
 * Each error carries a machine-readable `code` alongside the message.
 */

export class CodecError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CodecError";
  }
}

/**
 * A symbol outside the codec's alphabet, reported at its zero-based offset
 * in the encoded input.
 */
export class CorruptInputError extends CodecError {
  constructor(
    public readonly codec: string,
    public readonly position: number
  ) {
    super("CORRUPT_INPUT", `${codec}: illegal data at input byte ${position}`);
    this.name = "CorruptInputError";
  }
}

export class AlphabetError extends CodecError {
  constructor(message: string) {
    super("INVALID_ALPHABET", message);
    this.name = "AlphabetError";
  }
}

export class EncoderClosedError extends CodecError {
  constructor() {
    super("ENCODER_CLOSED", "write after close");
    this.name = "EncoderClosedError";
  }
}

/**
 * Raised when the sink fails during `StreamEncoder.write`.
 *
 * `consumed` is the full length of the chunk passed to `write`, even when only
 * part of the encoded output reached the sink. The encoder must be discarded.
 */
export class StreamWriteError extends CodecError {
  constructor(
    public readonly consumed: number,
    cause: unknown
  ) {
    super("STREAM_WRITE_FAILED", `sink write failed: ${describe(cause)}`, { cause });
    this.name = "StreamWriteError";
  }
}

export class ShortWriteError extends CodecError {
  constructor(
    public readonly written: number,
    public readonly expected: number
  ) {
    super("SHORT_WRITE", `short write: ${written} of ${expected} bytes`);
    this.name = "ShortWriteError";
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
