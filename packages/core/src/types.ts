/**
 * Core types for the wikicorpus system.
 */

// ── Articles ───────────────────────────────────────────────────────────────

/** One source record: a title and a body of `\n`-separated paragraphs. */
export interface Article {
  readonly title: string;
  readonly text: string;
}

export interface TokenizedArticle {
  readonly title: string;
  /** Space-joined tokens, one entry per source paragraph (blank ones included). */
  readonly paragraphs: readonly string[];
  /** Σ over paragraphs of (tokens + 1). */
  readonly tokenCount: number;
}

// ── Splits ─────────────────────────────────────────────────────────────────

export const SPLIT_NAMES = ["train", "valid", "test"] as const;

export type SplitName = (typeof SPLIT_NAMES)[number];

export type SplitBudgets = Readonly<Record<SplitName, number>>;

/** What a single writer call produced. */
export interface SplitStats {
  readonly documents: number;
  readonly tokens: number;
}

// ── Source policy ──────────────────────────────────────────────────────────

/** What to do with a record line that cannot be parsed into an article. */
export type MalformedPolicy = "fail" | "skip";
