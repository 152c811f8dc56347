import { describe, it, expect } from "vitest";
import {
  DEFAULT_INPUT_FILE,
  DEFAULT_OUTPUT_FILE,
  loadWikiContentConfig,
  resolveApiBaseUrl,
} from "../lib/wiki-config";
import { ConfigError } from "../lib/wiki-errors";

describe("Wiki Content Config", () => {
  it("should fall back to defaults with an empty environment", () => {
    expect(loadWikiContentConfig({})).toEqual({
      inputFile: DEFAULT_INPUT_FILE,
      outputFile: DEFAULT_OUTPUT_FILE,
      jsonOutputFile: undefined,
      accessToken: undefined,
      apiBaseUrl: "https://open.feishu.cn",
    });
  });

  it("should read the access token and paths from the environment", () => {
    const config = loadWikiContentConfig({
      LARK_USER_ACCESS_TOKEN: "test-token",
      WIKI_INPUT_FILE: "in.json",
      WIKI_OUTPUT_FILE: "out.txt",
      WIKI_JSON_OUTPUT_FILE: "out.json",
      LARK_DOMAIN: "lark",
    });

    expect(config).toEqual({
      inputFile: "in.json",
      outputFile: "out.txt",
      jsonOutputFile: "out.json",
      accessToken: "test-token",
      apiBaseUrl: "https://open.larksuite.com",
    });
  });

  it("should treat a blank token as absent", () => {
    expect(loadWikiContentConfig({ LARK_USER_ACCESS_TOKEN: "   " }).accessToken).toBeUndefined();
  });

  it("should prefer CLI overrides over the environment", () => {
    const config = loadWikiContentConfig(
      { WIKI_INPUT_FILE: "env.json", LARK_DOMAIN: "lark" },
      { jsonInput: "cli.json", output: "cli.txt", domain: "feishu" }
    );

    expect(config.inputFile).toBe("cli.json");
    expect(config.outputFile).toBe("cli.txt");
    expect(config.apiBaseUrl).toBe("https://open.feishu.cn");
  });

  describe("resolveApiBaseUrl", () => {
    it("should resolve named domains case-insensitively", () => {
      expect(resolveApiBaseUrl("Feishu")).toBe("https://open.feishu.cn");
      expect(resolveApiBaseUrl("LARK")).toBe("https://open.larksuite.com");
    });

    it("should accept an explicit origin and strip trailing slashes", () => {
      expect(resolveApiBaseUrl("http://localhost:8080/")).toBe("http://localhost:8080");
    });

    it("should reject anything else", () => {
      expect(() => resolveApiBaseUrl("open.feishu.cn")).toThrow(ConfigError);
      expect(() => resolveApiBaseUrl("ftp://open.feishu.cn")).toThrow(ConfigError);
    });
  });
});
