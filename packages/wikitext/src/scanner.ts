import type { Tokenizer } from "@wikicorpus/core";
import type { ArticleCursor } from "./source.js";
import { tokenizeArticle, isAccepted } from "./article.js";

/**
 * Total tokens a full write pass would account for: `tokenCount + 1` summed
 * over every accepted article. Drains `cursor`, so callers pass a fresh one.
 */
export async function findTotalTokens(cursor: ArticleCursor, tokenizer: Tokenizer): Promise<number> {
  let total = 0;
  for (;;) {
    const article = await cursor.next();
    if (!article) break;
    const tokenized = tokenizeArticle(article, tokenizer);
    if (isAccepted(tokenized)) total += tokenized.tokenCount + 1;
  }
  return total;
}
