import type { MalformedPolicy, SplitBudgets, SplitName, SplitStats } from "@wikicorpus/core";

export interface BuildConfig {
  /** Root of the shard tree (directories of JSON-lines files). */
  input: string;
  /** Output root; splits land in `<output>/<lang>/`. */
  output: string;
  lang: string;
  /** Total token budget. Omitted: scan the input to find it. */
  tokens?: number;
  /** Share given to each of valid and test. Default: 0.1. */
  validTestFraction?: number;
  /** Default: "fail". */
  onMalformed?: MalformedPolicy;
}

export interface SplitReport extends SplitStats {
  readonly name: SplitName;
  readonly path: string;
  readonly budget: number;
  readonly uniqueTokens: number;
}

export interface BuildResult {
  readonly totalTokens: number;
  /** Whether `totalTokens` came from a scan of the input. */
  readonly scanned: boolean;
  readonly budgets: SplitBudgets;
  readonly splits: readonly SplitReport[];
  readonly skippedRecords: number;
}

export interface CsvConfig {
  input: string;
  /** Output CSV file. */
  out: string;
  tokens?: number;
  onMalformed?: MalformedPolicy;
}
