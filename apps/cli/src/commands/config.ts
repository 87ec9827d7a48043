import type { Command } from "commander";
import {
  CONFIG_KEYS,
  defaultConfig,
  getConfigPath,
  getConfigValue,
  loadConfig,
  saveConfig,
  setConfigValue,
} from "../lib/config";
import { createFormatter } from "../lib/output";

export function registerConfigCommands(program: Command): void {
  const config = program.command("config").description("Manage CLI configuration");

  config
    .command("list")
    .alias("ls")
    .description("Show every configuration value")
    .action(() => {
      const formatter = createFormatter(program.opts());
      const cfg = loadConfig();

      formatter.output(cfg, (data) =>
        CONFIG_KEYS.map((key) => `${key.padEnd(14)} ${String(data[key])}`).join("\n")
      );
    });

  config
    .command("set <key> <value>")
    .description(`Set a configuration value (${CONFIG_KEYS.join(", ")})`)
    .action((key: string, value: string) => {
      const formatter = createFormatter(program.opts());

      const cfg = setConfigValue(loadConfig(), key, value);
      saveConfig(cfg);

      formatter.success(`Set ${key} = ${getConfigValue(cfg, key)}`);
    });

  config
    .command("get <key>")
    .description("Get a configuration value")
    .action((key: string) => {
      const formatter = createFormatter(program.opts());
      const value = getConfigValue(loadConfig(), key);

      if (value === undefined) {
        formatter.error(`Configuration key "${key}" not found`);
        process.exit(1);
      }

      formatter.output({ key, value }, () => value);
    });

  config
    .command("reset")
    .description("Restore the default configuration")
    .action(() => {
      const formatter = createFormatter(program.opts());
      saveConfig(defaultConfig());
      formatter.success(`Configuration reset in ${getConfigPath()}`);
    });

  config
    .command("path")
    .description("Show configuration file path")
    .action(() => {
      const formatter = createFormatter(program.opts());
      const configPath = getConfigPath();

      formatter.output({ path: configPath }, () => configPath);
    });
}
