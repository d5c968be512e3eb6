export {
  SPLIT_NAMES,
  type Article,
  type TokenizedArticle,
  type SplitName,
  type SplitBudgets,
  type SplitStats,
  type MalformedPolicy,
} from "./types.js";

export { type Tokenizer, TokenizerService } from "./interfaces.js";

export {
  TokenizerError,
  SourceError,
  CorpusError,
  ConfigError,
} from "./errors.js";

export { Registry } from "./registry.js";
