import { isStreaming, listCodecs } from "@basekit/encoding";
import type { Command } from "commander";
import { loadConfig } from "../lib/config";
import { createFormatter } from "../lib/output";

export function registerCodecsCommand(program: Command): void {
  program
    .command("codecs")
    .description("List available codecs")
    .action(() => {
      const formatter = createFormatter(program.opts());
      const { defaultCodec } = loadConfig();

      const rows = listCodecs().map((codec) => ({
        name: codec.name,
        radix: codec.radix,
        streaming: isStreaming(codec),
        description: codec.description,
      }));

      formatter.output(rows, (data) =>
        data
          .map((row) => {
            const marker = row.name === defaultCodec ? "* " : "  ";
            const flag = row.streaming ? " (streaming)" : "";
            return `${marker}${row.name.padEnd(12)} ${String(row.radix).padStart(3)}  ${row.description}${flag}`;
          })
          .join("\n")
      );
    });
}
