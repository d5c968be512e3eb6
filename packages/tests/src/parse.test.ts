import * as fs from "node:fs";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConfigError } from "@wikicorpus/core";
import { parseKV, positionals, optionalIntArg, oneOfArg, loadConfig } from "@wikicorpus/cli/parse";
import { tempDir, removeDir } from "./fixtures.js";

describe("parseKV", () => {
  it("accepts =, spaced values, flags and aliases", () => {
    expect(parseKV(["--input=a", "--output", "b", "-l", "hi", "--verbose"])).toEqual({
      input: "a",
      output: "b",
      lang: "hi",
      verbose: "true",
    });
  });

  it("keeps everything after the first = in the value", () => {
    expect(parseKV(["--filter=a=b"])).toEqual({ filter: "a=b" });
  });

  it("takes a negative number as a value, not an option", () => {
    expect(parseKV(["--tokens", "-5", "-l", "hi"])).toEqual({ tokens: "-5", lang: "hi" });
    expect(optionalIntArg(parseKV(["-t", "-7"]), "tokens")).toBe(-7);
    expect(parseKV(["--verbose", "-l", "hi"])).toEqual({ verbose: "true", lang: "hi" });
  });
});

describe("positionals", () => {
  it("skips options and their values", () => {
    expect(positionals(["a.tokens", "--logLevel", "debug", "b.tokens", "--x=1"])).toEqual([
      "a.tokens",
      "b.tokens",
    ]);
  });

  it("skips a negative option value", () => {
    expect(positionals(["--tokens", "-5", "a.tokens"])).toEqual(["a.tokens"]);
  });
});

describe("optionalIntArg", () => {
  it("parses integers and leaves absent options undefined", () => {
    expect(optionalIntArg({ tokens: "13000000" }, "tokens")).toBe(13_000_000);
    expect(optionalIntArg({}, "tokens")).toBeUndefined();
  });

  it("rejects non-integers", () => {
    expect(() => optionalIntArg({ tokens: "1e6" }, "tokens")).toThrow(ConfigError);
  });
});

describe("oneOfArg", () => {
  it("checks the value against the choices", () => {
    const choices = ["fail", "skip"] as const;
    expect(oneOfArg({}, "onMalformed", choices, "fail")).toBe("fail");
    expect(oneOfArg({ onMalformed: "skip" }, "onMalformed", choices, "fail")).toBe("skip");
    expect(() => oneOfArg({ onMalformed: "ignore" }, "onMalformed", choices, "fail")).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  function configFile(body: string): string {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, body);
    return file;
  }

  it("returns the arguments unchanged without --config", async () => {
    expect(await loadConfig({ lang: "en" })).toEqual({ lang: "en" });
  });

  it("merges file values under command-line ones", async () => {
    const file = configFile(JSON.stringify({ input: "a", tokens: 100, lang: "hi", note: null }));
    expect(await loadConfig({ config: file, lang: "en" })).toEqual({
      input: "a",
      tokens: "100",
      lang: "en",
      config: file,
    });
  });

  it("rejects a file that is not a JSON object", async () => {
    const file = configFile("[1]");
    await expect(loadConfig({ config: file })).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects nested values", async () => {
    const file = configFile(JSON.stringify({ input: { path: "a" } }));
    await expect(loadConfig({ config: file })).rejects.toBeInstanceOf(ConfigError);
  });
});
