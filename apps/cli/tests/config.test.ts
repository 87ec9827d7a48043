/**
 * CLI config file tests (BASEKIT_HOME points at a temp directory)
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  defaultConfig,
  getConfigPath,
  getConfigValue,
  loadConfig,
  saveConfig,
  setConfigValue,
} from "../src/lib/config";

let home: string;
const previousHome = process.env.BASEKIT_HOME;

beforeEach(() => {
  home = fs.mkdtempSync(path.join(os.tmpdir(), "basekit-config-"));
  process.env.BASEKIT_HOME = home;
});

afterEach(() => {
  fs.rmSync(home, { recursive: true, force: true });
  if (previousHome === undefined) delete process.env.BASEKIT_HOME;
  else process.env.BASEKIT_HOME = previousHome;
});

describe("config", () => {
  it("should default to base91 with 64 KiB chunks", () => {
    expect(defaultConfig()).toEqual({ defaultCodec: "base91", chunkSize: 65536, newline: false });
  });

  it("should resolve the config path under BASEKIT_HOME", () => {
    expect(getConfigPath()).toBe(path.join(home, "config.json"));
  });

  it("should return defaults when no file exists", () => {
    expect(loadConfig()).toEqual(defaultConfig());
  });

  it("should round-trip through the file", () => {
    saveConfig({ defaultCodec: "hex", chunkSize: 4096, newline: true });
    expect(loadConfig()).toEqual({ defaultCodec: "hex", chunkSize: 4096, newline: true });
  });

  it("should fill missing keys with defaults", () => {
    fs.writeFileSync(getConfigPath(), JSON.stringify({ defaultCodec: "base64" }));
    expect(loadConfig()).toEqual({ defaultCodec: "base64", chunkSize: 65536, newline: false });
  });

  it("should fall back to defaults on an invalid file", () => {
    fs.writeFileSync(getConfigPath(), JSON.stringify({ defaultCodec: "base58" }));
    expect(loadConfig()).toEqual(defaultConfig());

    fs.writeFileSync(getConfigPath(), "{ not json");
    expect(loadConfig()).toEqual(defaultConfig());
  });

  describe("setConfigValue", () => {
    it("should set a codec", () => {
      const cfg = setConfigValue(defaultConfig(), "defaultCodec", "base32");
      expect(cfg.defaultCodec).toBe("base32");
    });

    it("should parse numbers and booleans", () => {
      let cfg = setConfigValue(defaultConfig(), "chunkSize", "1024");
      cfg = setConfigValue(cfg, "newline", "true");
      expect(cfg).toEqual({ defaultCodec: "base91", chunkSize: 1024, newline: true });
    });

    it("should not modify its input", () => {
      const original = defaultConfig();
      setConfigValue(original, "chunkSize", "1024");
      expect(original.chunkSize).toBe(65536);
    });

    it("should reject unknown keys", () => {
      expect(() => setConfigValue(defaultConfig(), "profile", "x")).toThrow(
        "Unknown config key: profile"
      );
    });

    it("should reject invalid values", () => {
      expect(() => setConfigValue(defaultConfig(), "defaultCodec", "base58")).toThrow(
        /^Invalid value for defaultCodec/
      );
      expect(() => setConfigValue(defaultConfig(), "chunkSize", "8")).toThrow(
        /^Invalid value for chunkSize/
      );
      expect(() => setConfigValue(defaultConfig(), "chunkSize", "12k")).toThrow(
        /^Invalid value for chunkSize/
      );
      expect(() => setConfigValue(defaultConfig(), "newline", "yes")).toThrow(
        'Invalid value for newline: expected true or false, got "yes"'
      );
    });
  });

  it("should read values as strings", () => {
    expect(getConfigValue(defaultConfig(), "chunkSize")).toBe("65536");
    expect(getConfigValue(defaultConfig(), "newline")).toBe("false");
    expect(getConfigValue(defaultConfig(), "missing")).toBeUndefined();
  });
});
