import { describe, expect, it } from "vitest";
import { generateBashCompletion } from "../src/commands/completion";

describe("generateBashCompletion", () => {
  it("should list every codec for --codec", () => {
    const script = generateBashCompletion();
    expect(script).toContain(
      'local codecs="hex base32 crockford32 base45 base58 base62 base64 base64url base85 base91 base100"'
    );
  });

  it("should list the config keys", () => {
    expect(generateBashCompletion()).toContain(
      'local config_keys="defaultCodec chunkSize newline"'
    );
  });

  it("should register the completion function", () => {
    expect(generateBashCompletion()).toContain("complete -F _basekit_completions basekit");
  });
});
