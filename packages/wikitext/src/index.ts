export { listShardFiles, parseRecord, isStub, readArticles, ArticleCursor } from "./source.js";
export type { ReadArticlesOptions } from "./source.js";
export { planSplits, checkBudget, DEFAULT_VALID_TEST_FRACTION } from "./planner.js";
export {
  MIN_ARTICLE_TOKENS,
  countTokens,
  tokenizeArticle,
  isAccepted,
  formatArticle,
} from "./article.js";
export { writeWikitext } from "./writer.js";
export { findTotalTokens } from "./scanner.js";
export { countUnique, countTokenFrequencies } from "./vocab.js";
export { wiki2csv, flattenArticle, CSV_PROGRESS_INTERVAL } from "./csv.js";
export { buildWikitext, exportCsv, checkInput, splitFileName } from "./pipeline.js";
export type { BuildConfig, BuildResult, CsvConfig, SplitReport } from "./types.js";
