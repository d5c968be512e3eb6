import * as fs from "node:fs";
import type { SplitStats, Tokenizer } from "@wikicorpus/core";
import type { ArticleCursor } from "./source.js";
import { tokenizeArticle, isAccepted, formatArticle } from "./article.js";

/**
 * Write one split from the shared cursor.
 *
 * Short articles are dropped for good (they are not handed on to the next
 * split). Every written article counts `tokenCount + 1` against `budget`;
 * once the running total exceeds it, the writer stops pulling and the cursor
 * stays where the next split should start. With no budget the cursor is
 * drained.
 */
export async function writeWikitext(
  filePath: string,
  cursor: ArticleCursor,
  tokenizer: Tokenizer,
  budget?: number,
): Promise<SplitStats> {
  const fd = fs.openSync(filePath, "w");
  let documents = 0;
  let tokens = 0;
  try {
    for (;;) {
      const article = await cursor.next();
      if (!article) break;

      const tokenized = tokenizeArticle(article, tokenizer);
      if (!isAccepted(tokenized)) continue;

      fs.writeSync(fd, formatArticle(tokenized));
      documents++;
      tokens += tokenized.tokenCount + 1;
      if (budget !== undefined && tokens > budget) break;
    }
  } finally {
    fs.closeSync(fd);
  }
  return { documents, tokens };
}
