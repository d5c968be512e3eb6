/**
 * Language-aware tokenizer built on `Intl.Segmenter`.
 *
 * Uses word granularity for the configured language and keeps every segment
 * that is not pure whitespace, so punctuation marks become tokens of their
 * own: "Hello, world." -> ["Hello", ",", "world", "."].
 */
import { TokenizerError, type Tokenizer } from "@wikicorpus/core";

export class SegmenterTokenizer implements Tokenizer {
  readonly name = "segmenter";
  readonly lang: string;

  private readonly _segmenter: Intl.Segmenter;

  /** Throws `TokenizerError` when the runtime has no locale data for `lang`. */
  constructor(lang: string) {
    let supported: string[];
    try {
      supported = Intl.Segmenter.supportedLocalesOf([lang]);
    } catch (cause) {
      throw new TokenizerError({ message: `Invalid language code "${lang}"`, cause });
    }
    if (supported.length === 0) {
      throw new TokenizerError({ message: `Unsupported language code "${lang}"` });
    }
    this.lang = lang;
    this._segmenter = new Intl.Segmenter(lang, { granularity: "word" });
  }

  tokenize(text: string): string[] {
    const tokens: string[] = [];
    for (const { segment } of this._segmenter.segment(text)) {
      if (segment.trim().length > 0) tokens.push(segment);
    }
    return tokens;
  }

  tokenizeToString(text: string): string {
    return this.tokenize(text).join(" ");
  }
}
