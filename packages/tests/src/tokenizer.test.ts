import { describe, it, expect } from "vitest";
import { TokenizerError } from "@wikicorpus/core";
import {
  SegmenterTokenizer,
  WhitespaceTokenizer,
  tokenizerRegistry,
} from "@wikicorpus/tokenizers";

describe("WhitespaceTokenizer", () => {
  it("splits on runs of whitespace", () => {
    const tok = new WhitespaceTokenizer("xx");
    expect(tok.tokenize("  a\tb  c ")).toEqual(["a", "b", "c"]);
    expect(tok.tokenizeToString("  a\tb  c ")).toBe("a b c");
    expect(tok.tokenize("")).toEqual([]);
  });
});

describe("SegmenterTokenizer", () => {
  it("separates punctuation from words", () => {
    const tok = new SegmenterTokenizer("en");
    expect(tok.tokenize("Hello, world.")).toEqual(["Hello", ",", "world", "."]);
    expect(tok.tokenizeToString("Hello, world.")).toBe("Hello , world .");
  });

  it("returns nothing for blank text", () => {
    expect(new SegmenterTokenizer("en").tokenizeToString("   ")).toBe("");
  });

  it("rejects malformed language codes", () => {
    expect(() => new SegmenterTokenizer("not a tag!")).toThrow(TokenizerError);
  });
});

describe("tokenizerRegistry", () => {
  it("builds tokenizers for a language", () => {
    expect(tokenizerRegistry.list()).toEqual(["segmenter", "whitespace"]);
    const tok = tokenizerRegistry.get("whitespace", "hi");
    expect(tok.name).toBe("whitespace");
    expect(tok.lang).toBe("hi");
  });

  it("names the available tokenizers on a miss", () => {
    expect(() => tokenizerRegistry.get("moses", "en")).toThrow(
      '[tokenizer] Unknown implementation "moses". Available: segmenter, whitespace',
    );
  });
});
