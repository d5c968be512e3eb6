/**
 * Command: wikicorpus build
 *
 * Usage:
 *   wikicorpus build --input=data/wiki_extr/hi --output=data/wiki --lang=hi --tokens=13000000
 */
import { Effect, Layer } from "effect";
import { TokenizerLive, loggingLayer } from "@wikicorpus/effect-runtime";
import { DEFAULT_TOKENIZER } from "@wikicorpus/tokenizers";
import { buildWikitext, DEFAULT_VALID_TEST_FRACTION } from "@wikicorpus/wikitext";
import {
  parseKV,
  loadConfig,
  requireArg,
  strArg,
  floatArg,
  optionalIntArg,
  oneOfArg,
} from "../parse.js";
import { defaultLogLevel } from "../env.js";

export async function buildCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const input = requireArg(kv, "input", "directory of extracted article shards");
  const output = requireArg(kv, "output", "output root");
  const lang = requireArg(kv, "lang", "ISO language code, e.g. en, hi");
  const tokens = optionalIntArg(kv, "tokens");
  const tokenizerName = strArg(kv, "tokenizer", DEFAULT_TOKENIZER);
  const validTestFraction = floatArg(kv, "validTestFraction", DEFAULT_VALID_TEST_FRACTION);
  const onMalformed = oneOfArg(kv, "onMalformed", ["fail", "skip"] as const, "fail");
  const logLevel = strArg(kv, "logLevel", defaultLogLevel());

  const program = buildWikitext({ input, output, lang, tokens, validTestFraction, onMalformed });
  const layer = Layer.merge(TokenizerLive(tokenizerName, lang), loggingLayer(logLevel));
  const result = await Effect.runPromise(Effect.provide(program, layer));

  const docs = result.splits.map((s) => `${s.name}=${s.documents}`).join(" ");
  console.log(`\nDone: ${result.totalTokens} tokens planned (${docs})`);
}
