import * as fs from "node:fs";
import { stringify } from "csv-stringify/sync";
import type { SplitStats } from "@wikicorpus/core";
import type { ArticleCursor } from "./source.js";
import { MIN_ARTICLE_TOKENS, countTokens } from "./article.js";

export const CSV_PROGRESS_INTERVAL = 100_000;

type ProgressFn = (processed: number, tokens: number) => void;

/** One CSV row's worth of an article: trimmed paragraphs and their count. */
export function flattenArticle(text: string): { body: string; tokenCount: number } {
  const paragraphs: string[] = [];
  let tokenCount = 0;
  for (const paragraph of text.split("\n")) {
    const trimmed = paragraph.trim();
    paragraphs.push(trimmed);
    tokenCount += countTokens(trimmed) + 1;
  }
  return { body: paragraphs.join("\n"), tokenCount };
}

/**
 * Export accepted articles as single-column CSV, untokenized.
 *
 * Acceptance and budget accounting match `writeWikitext`, with whitespace
 * splitting in place of a tokenizer. `onProgress` fires every
 * `progressInterval` articles pulled from the cursor.
 */
export async function wiki2csv(
  filePath: string,
  cursor: ArticleCursor,
  budget?: number,
  onProgress?: ProgressFn,
  progressInterval: number = CSV_PROGRESS_INTERVAL,
): Promise<SplitStats> {
  const fd = fs.openSync(filePath, "w");
  let processed = 0;
  let documents = 0;
  let tokens = 0;
  try {
    for (;;) {
      const article = await cursor.next();
      if (!article) break;
      processed++;
      // counts every pulled article, short ones included
      if (processed % progressInterval === 0) onProgress?.(processed, tokens);

      const { body, tokenCount } = flattenArticle(article.text);
      if (tokenCount < MIN_ARTICLE_TOKENS) continue;

      fs.writeSync(fd, stringify([[body]], { delimiter: ",", quote: '"', record_delimiter: "unix" }));
      documents++;
      tokens += tokenCount + 1;
      if (budget !== undefined && tokens > budget) break;
    }
  } finally {
    fs.closeSync(fd);
  }
  return { documents, tokens };
}
