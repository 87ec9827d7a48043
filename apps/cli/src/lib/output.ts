import chalk from "chalk";
import Table from "cli-table3";
import YAML from "yaml";

export type OutputFormat = "text" | "json" | "yaml" | "table";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json", "yaml", "table"];

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

/**
 * Prints command results to stdout and status lines to stderr, so that
 * status never mixes with codec output piped through stdout.
 */
export class OutputFormatter {
  constructor(
    private options: OutputOptions,
    private readonly out: (line: string) => void = (line) => console.log(line),
    private readonly err: (line: string) => void = (line) => console.error(line)
  ) {}

  get format(): OutputFormat {
    return this.options.format;
  }

  // Output structured data
  output<T>(data: T, textFormatter?: (data: T) => string): void {
    if (this.options.quiet && this.options.format === "text") {
      return;
    }

    switch (this.options.format) {
      case "json":
        this.out(JSON.stringify(data, null, 2));
        break;
      case "yaml":
        this.out(YAML.stringify(data).trimEnd());
        break;
      case "table":
        if (Array.isArray(data)) {
          this.printTable(data.filter(isRecord));
        } else if (isRecord(data)) {
          this.printObjectTable(data);
        } else {
          this.out(String(data));
        }
        break;
      default:
        this.out(textFormatter ? textFormatter(data) : String(data));
    }
  }

  // Print array as table
  printTable(rows: Array<Record<string, unknown>>): void {
    const firstRow = rows[0];
    if (!firstRow) {
      this.out("(empty)");
      return;
    }

    const cols = Object.keys(firstRow);
    const table = new Table({
      head: cols.map((c) => chalk.bold(c.toUpperCase())),
      style: { head: [], border: [] },
    });

    for (const row of rows) {
      table.push(cols.map((c) => formatValue(row[c])));
    }

    this.out(table.toString());
  }

  // Print object as key-value table
  printObjectTable(obj: Record<string, unknown>): void {
    const table = new Table({
      style: { head: [], border: [] },
    });

    for (const [key, value] of Object.entries(obj)) {
      table.push([chalk.bold(key), formatValue(value)]);
    }

    this.out(table.toString());
  }

  success(message: string): void {
    if (!this.options.quiet) {
      this.err(`${chalk.green("✓")} ${message}`);
    }
  }

  error(message: string): void {
    this.err(`${chalk.red("✗")} ${message}`);
  }

  // Verbose only
  debug(message: string): void {
    if (this.options.verbose) {
      this.err(`${chalk.gray("⋯")} ${chalk.gray(message)}`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray("—");
  }
  if (typeof value === "boolean") {
    return value ? chalk.green("true") : chalk.red("false");
  }
  if (typeof value === "number") {
    return chalk.cyan(String(value));
  }
  if (Array.isArray(value)) {
    return value.join(", ");
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

// Helper to create formatter from command options
export function createFormatter(options: {
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
}): OutputFormatter {
  const format = options.format ?? "text";
  if (!isOutputFormat(format)) {
    throw new Error(`Unknown output format "${format}". Use one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return new OutputFormatter({
    format,
    quiet: options.quiet || false,
    verbose: options.verbose || false,
  });
}

// Format file size
export function formatSize(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const size = bytes / 1024 ** i;
  return `${size.toFixed(i === 0 ? 0 : 2)} ${units[i]}`;
}
