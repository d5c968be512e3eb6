/**
 * Command: wikicorpus csv
 *
 * Export articles untokenized, one CSV row each.
 */
import { Effect } from "effect";
import { loggingLayer } from "@wikicorpus/effect-runtime";
import { exportCsv } from "@wikicorpus/wikitext";
import { parseKV, loadConfig, requireArg, strArg, optionalIntArg, oneOfArg } from "../parse.js";
import { defaultLogLevel } from "../env.js";

export async function csvCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const input = requireArg(kv, "input", "directory of extracted article shards");
  const out = requireArg(kv, "out", "output CSV path");
  const tokens = optionalIntArg(kv, "tokens");
  const onMalformed = oneOfArg(kv, "onMalformed", ["fail", "skip"] as const, "fail");
  const logLevel = strArg(kv, "logLevel", defaultLogLevel());

  await Effect.runPromise(
    Effect.provide(exportCsv({ input, out, tokens, onMalformed }), loggingLayer(logLevel)),
  );
}
