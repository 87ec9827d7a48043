import { CommanderError, Command } from "commander";
import { registerCodecsCommand } from "./commands/codecs";
import { registerCompletionCommands } from "./commands/completion";
import { registerConfigCommands } from "./commands/config";
import { registerTranscodeCommands } from "./commands/transcode";
import { createFormatter } from "./lib/output";

const program = new Command();

program
  .name("basekit")
  .description("Encode and decode binary data with the basekit codec family")
  .version("0.1.0")
  .option("-f, --format <type>", "output format: text|json|yaml|table", "text")
  .option("-v, --verbose", "verbose output")
  .option("-q, --quiet", "quiet mode");

// Register all command groups
registerTranscodeCommands(program);
registerCodecsCommand(program);
registerConfigCommands(program);
registerCompletionCommands(program);

// Global error handler
program.exitOverride();

const EXIT_OK_CODES = new Set([
  "commander.helpDisplayed",
  "commander.version",
  "commander.help",
]);

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    // If no subcommand is provided, show help
    if (process.argv.length <= 2) {
      program.outputHelp();
    }
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // Commander already printed its own message
      process.exit(EXIT_OK_CODES.has(error.code) ? 0 : error.exitCode);
    }
    const formatter = createFormatter({ format: "text" });
    formatter.error(error instanceof Error ? error.message : "An unexpected error occurred");
    process.exit(1);
  }
}

void main();
