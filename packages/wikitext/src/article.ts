import type { Article, TokenizedArticle, Tokenizer } from "@wikicorpus/core";

/** Articles below this many tokens are never written. */
export const MIN_ARTICLE_TOKENS = 100;

/** Count non-empty pieces of a whitespace-joined token string. */
export function countTokens(tokenized: string): number {
  let n = 0;
  for (const piece of tokenized.split(/\s+/)) {
    if (piece.length > 0) n++;
  }
  return n;
}

/**
 * Tokenize an article paragraph by paragraph.
 *
 * Each paragraph contributes its token count plus one for the newline that
 * follows it on output, blank paragraphs included.
 */
export function tokenizeArticle(article: Article, tokenizer: Tokenizer): TokenizedArticle {
  const paragraphs: string[] = [];
  let tokenCount = 0;
  for (const paragraph of article.text.split("\n")) {
    const tokenized = tokenizer.tokenizeToString(paragraph.trim());
    paragraphs.push(tokenized);
    tokenCount += countTokens(tokenized) + 1;
  }
  return { title: article.title, paragraphs, tokenCount };
}

export function isAccepted(tokenized: TokenizedArticle): boolean {
  return tokenized.tokenCount >= MIN_ARTICLE_TOKENS;
}

/** Header line plus one line per paragraph, newline-terminated. */
export function formatArticle(tokenized: TokenizedArticle): string {
  let out = `= ${tokenized.title.trim()} =\n`;
  for (const p of tokenized.paragraphs) out += p + "\n";
  return out;
}
