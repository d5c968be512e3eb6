/**
 * Whitespace tokenizer.
 *
 * Splits on runs of whitespace and nothing else. The language code is kept
 * for reporting only; any code is accepted.
 */
import type { Tokenizer } from "@wikicorpus/core";

export class WhitespaceTokenizer implements Tokenizer {
  readonly name = "whitespace";
  readonly lang: string;

  constructor(lang: string) {
    this.lang = lang;
  }

  tokenize(text: string): string[] {
    return text.split(/\s+/).filter((w) => w.length > 0);
  }

  tokenizeToString(text: string): string {
    return this.tokenize(text).join(" ");
  }
}
