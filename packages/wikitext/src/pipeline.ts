/**
 * Corpus pipelines as Effect programs.
 *
 * The library functions they call are plain async functions; here every one
 * of them is wrapped so failures come out as typed errors, and progress goes
 * through Effect's logger.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { Effect, Runtime } from "effect";
import {
  SPLIT_NAMES,
  TokenizerService,
  SourceError,
  CorpusError,
  ConfigError,
  TokenizerError,
  type MalformedPolicy,
  type SplitName,
} from "@wikicorpus/core";
import { withSpan } from "@wikicorpus/effect-runtime";
import { ArticleCursor } from "./source.js";
import { planSplits, checkBudget, DEFAULT_VALID_TEST_FRACTION } from "./planner.js";
import { writeWikitext } from "./writer.js";
import { findTotalTokens } from "./scanner.js";
import { countUnique } from "./vocab.js";
import { wiki2csv } from "./csv.js";
import type { BuildConfig, BuildResult, CsvConfig, SplitReport } from "./types.js";

type RunError = SourceError | CorpusError | TokenizerError;

function toRunError(cause: unknown, filePath: string): RunError {
  if (cause instanceof SourceError || cause instanceof CorpusError || cause instanceof TokenizerError) {
    return cause;
  }
  return new CorpusError({ message: `I/O failure on "${filePath}": ${String(cause)}`, path: filePath, cause });
}

function tryIO<A>(filePath: string, run: () => Promise<A>): Effect.Effect<A, RunError> {
  return Effect.tryPromise({ try: run, catch: (cause) => toRunError(cause, filePath) });
}

function toConfigError(cause: unknown): ConfigError {
  return cause instanceof ConfigError ? cause : new ConfigError({ message: String(cause), cause });
}

function makeDir(dir: string): Effect.Effect<void, CorpusError> {
  return Effect.try({
    try: () => {
      fs.mkdirSync(dir, { recursive: true });
    },
    catch: (cause) => new CorpusError({ message: `Cannot create directory "${dir}"`, path: dir, cause }),
  });
}

/** Fails unless `root` is an existing directory. */
export function checkInput(root: string): Effect.Effect<void, SourceError> {
  return Effect.suspend((): Effect.Effect<void, SourceError> =>
    fs.existsSync(root) && fs.statSync(root).isDirectory()
      ? Effect.void
      : Effect.fail(new SourceError({ message: `Error: ${root} does not exist.`, path: root })),
  );
}

/** Run `use` with a cursor over `root`, closing it afterwards. */
function withCursor<A, E, R>(
  root: string,
  onMalformed: MalformedPolicy,
  use: (cursor: ArticleCursor) => Effect.Effect<A, E, R>,
): Effect.Effect<A, E, R> {
  return Effect.acquireUseRelease(
    Effect.sync(() => ArticleCursor.open(root, onMalformed)),
    use,
    (cursor) => Effect.promise(() => cursor.close()),
  );
}

export function splitFileName(lang: string, split: SplitName): string {
  return `${lang}.wiki.${split}.tokens`;
}

const fmt = (n: number) => n.toLocaleString("en-US");

/**
 * Build train/valid/test token files from the articles under `config.input`.
 *
 * All three splits are written from one cursor, in order, so each accepted
 * article lands in exactly one file.
 */
export function buildWikitext(
  config: BuildConfig,
): Effect.Effect<BuildResult, RunError | ConfigError, TokenizerService> {
  return Effect.gen(function* () {
    const onMalformed = config.onMalformed ?? "fail";
    yield* checkInput(config.input);
    const tokenizer = yield* TokenizerService;

    let totalTokens = config.tokens;
    const scanned = totalTokens === undefined;
    if (totalTokens === undefined) {
      yield* Effect.logInfo(`No token budget given, scanning ${config.input}`);
      totalTokens = yield* withSpan(
        "scan",
        withCursor(config.input, onMalformed, (cursor) =>
          tryIO(config.input, () => findTotalTokens(cursor, tokenizer))),
      );
      yield* Effect.logInfo(`Found ${fmt(totalTokens)} tokens`);
    }

    const total = totalTokens;
    const budgets = yield* Effect.try({
      try: () => planSplits(total, config.validTestFraction ?? DEFAULT_VALID_TEST_FRACTION),
      catch: toConfigError,
    });
    yield* Effect.logInfo(
      `Using Splits - Train: ${budgets.train}, Valid: ${budgets.valid}, Test: ${budgets.test}`,
    );

    const outDir = path.join(config.output, config.lang);
    yield* makeDir(outDir);

    const { written, skippedRecords } = yield* withCursor(config.input, onMalformed, (cursor) =>
      Effect.gen(function* () {
        const written: Array<{ name: SplitName; path: string; documents: number; tokens: number }> = [];
        for (const name of SPLIT_NAMES) {
          const filePath = path.join(outDir, splitFileName(config.lang, name));
          const stats = yield* withSpan(
            `write ${name}`,
            tryIO(filePath, () => writeWikitext(filePath, cursor, tokenizer, budgets[name])),
          );
          yield* Effect.logInfo(
            `${filePath}. # documents: ${fmt(stats.documents)}. # tokens: ${fmt(stats.tokens)}.`,
          );
          written.push({ name, path: filePath, ...stats });
        }
        return { written, skippedRecords: cursor.skipped };
      }),
    );
    if (skippedRecords > 0) {
      yield* Effect.logWarning(`Skipped ${fmt(skippedRecords)} malformed records`);
    }

    const splits: SplitReport[] = [];
    for (const w of written) {
      const uniqueTokens = yield* tryIO(w.path, () => countUnique(w.path));
      yield* Effect.logInfo(`Unique tokens ${w.path} - ${uniqueTokens}`);
      splits.push({ ...w, budget: budgets[w.name], uniqueTokens });
    }

    return { totalTokens: total, scanned, budgets, splits, skippedRecords };
  });
}

/** Export accepted articles under `config.input` as one-column CSV. */
export function exportCsv(
  config: CsvConfig,
): Effect.Effect<{ documents: number; tokens: number }, RunError | ConfigError> {
  return Effect.gen(function* () {
    yield* checkInput(config.input);
    const budget = config.tokens;
    if (budget !== undefined) {
      yield* Effect.try({ try: () => checkBudget(budget), catch: toConfigError });
    }
    yield* makeDir(path.dirname(config.out));
    yield* Effect.logInfo(`Writing to ${config.out}...`);

    const runtime = yield* Effect.runtime<never>();
    const logProgress = (processed: number, tokens: number) =>
      Runtime.runSync(runtime)(
        Effect.logInfo(`Processed ${fmt(processed)} documents. Total # tokens: ${fmt(tokens)}.`),
      );

    const stats = yield* withCursor(config.input, config.onMalformed ?? "fail", (cursor) =>
      tryIO(config.out, () => wiki2csv(config.out, cursor, config.tokens, logProgress)),
    );
    yield* Effect.logInfo(`${config.out}. # documents: ${fmt(stats.documents)}. # tokens: ${fmt(stats.tokens)}.`);
    return stats;
  });
}
