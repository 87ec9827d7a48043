import { getCodec } from "@basekit/encoding";
import { type Command, InvalidArgumentError } from "commander";
import { loadConfig, MAX_CHUNK_SIZE, MIN_CHUNK_SIZE } from "../lib/config";
import { fdSink, fdSource, openInput, openOutput } from "../lib/fd-io";
import { createFormatter, formatSize } from "../lib/output";
import { type Direction, transcode } from "../lib/transcode";

type TranscodeCommandOptions = {
  codec?: string;
  output?: string;
  chunkSize?: number;
  newline?: boolean;
  ignoreNewlines?: boolean;
};

function parseChunkSize(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || n < MIN_CHUNK_SIZE || n > MAX_CHUNK_SIZE) {
    throw new InvalidArgumentError(
      `must be an integer between ${MIN_CHUNK_SIZE} and ${MAX_CHUNK_SIZE}`
    );
  }
  return n;
}

export function registerTranscodeCommands(program: Command): void {
  program
    .command("encode [file]")
    .description("Encode a file (or stdin) to text")
    .option("-c, --codec <name>", "codec to use (see 'basekit codecs')")
    .option("-o, --output <path>", "output file path (default: stdout)")
    .option("--chunk-size <bytes>", "bytes read per call", parseChunkSize)
    .option("-n, --newline", "append a line break to the output")
    .action((file: string | undefined, cmdOpts: TranscodeCommandOptions) => {
      run(program, "encode", file, cmdOpts);
    });

  program
    .command("decode [file]")
    .description("Decode text from a file (or stdin) back to bytes")
    .option("-c, --codec <name>", "codec to use (see 'basekit codecs')")
    .option("-o, --output <path>", "output file path (default: stdout)")
    .option("--chunk-size <bytes>", "bytes read per call", parseChunkSize)
    .option("-i, --ignore-newlines", "skip CR and LF characters in the input")
    .action((file: string | undefined, cmdOpts: TranscodeCommandOptions) => {
      run(program, "decode", file, cmdOpts);
    });
}

function run(
  program: Command,
  direction: Direction,
  file: string | undefined,
  cmdOpts: TranscodeCommandOptions
): void {
  const formatter = createFormatter(program.opts());
  const config = loadConfig();
  const codec = getCodec(cmdOpts.codec ?? config.defaultCodec);
  const chunkSize = cmdOpts.chunkSize ?? config.chunkSize;

  const input = openInput(file);
  try {
    const output = openOutput(cmdOpts.output);
    try {
      const stats = transcode({
        codec,
        direction,
        source: fdSource(input.fd),
        sink: fdSink(output.fd),
        chunkSize,
        newline: cmdOpts.newline ?? config.newline,
        ignoreNewlines: cmdOpts.ignoreNewlines,
      });

      formatter.debug(
        `${codec.name} ${direction}: ${formatSize(stats.bytesIn)} in, ${formatSize(stats.bytesOut)} out` +
          (stats.streamed ? ` (streamed in ${formatSize(chunkSize)} chunks)` : "")
      );
      if (cmdOpts.output) {
        formatter.success(`Wrote ${formatSize(stats.bytesOut)} to ${cmdOpts.output}`);
      }
    } finally {
      output.close();
    }
  } finally {
    input.close();
  }
}
