import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { CodecNameSchema } from "@basekit/encoding";
import { z } from "zod";

export const MIN_CHUNK_SIZE = 16;
export const MAX_CHUNK_SIZE = 16 * 1024 * 1024;

export const ConfigSchema = z.object({
  /** Codec used when --codec is not given */
  defaultCodec: CodecNameSchema.default("base91"),
  /** Bytes read from the input per call */
  chunkSize: z.number().int().min(MIN_CHUNK_SIZE).max(MAX_CHUNK_SIZE).default(64 * 1024),
  /** Append a line break after encoded output */
  newline: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;

export const CONFIG_KEYS = ["defaultCodec", "chunkSize", "newline"] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function getBasekitDir(): string {
  return process.env.BASEKIT_HOME || path.join(os.homedir(), ".basekit");
}

export function getConfigPath(): string {
  return path.join(getBasekitDir(), "config.json");
}

export function ensureBasekitDir(): void {
  const dir = getBasekitDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

/**
 * Load the config file. A missing, unreadable or invalid file yields the
 * defaults.
 */
export function loadConfig(): Config {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }
  try {
    const content = fs.readFileSync(configPath, "utf-8");
    const parsed = ConfigSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : defaultConfig();
  } catch {
    return defaultConfig();
  }
}

export function saveConfig(config: Config): void {
  ensureBasekitDir();
  fs.writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), {
    encoding: "utf-8",
    mode: 0o600,
  });
}

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * Set one key from its command line string form.
 *
 * @throws Error on an unknown key or an invalid value
 */
export function setConfigValue(config: Config, key: string, value: string): Config {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key}. Known keys: ${CONFIG_KEYS.join(", ")}`);
  }

  let raw: unknown = value;
  if (key === "chunkSize") {
    raw = /^\d+$/.test(value) ? Number(value) : Number.NaN;
  } else if (key === "newline") {
    if (value !== "true" && value !== "false") {
      throw new Error(`Invalid value for newline: expected true or false, got "${value}"`);
    }
    raw = value === "true";
  }

  const parsed = ConfigSchema.safeParse({ ...config, [key]: raw });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid value for ${key}: ${issue ? issue.message : "rejected"}`);
  }
  return parsed.data;
}

export function getConfigValue(config: Config, key: string): string | undefined {
  if (!isConfigKey(key)) return undefined;
  return String(config[key]);
}

export function resolvePath(p: string): string {
  if (p.startsWith("~")) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}
