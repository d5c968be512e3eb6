/**
 * Effect layers for dependency injection.
 *
 * Each service gets a Layer that constructs it from config.
 */
import { Layer, Effect } from "effect";
import { TokenizerService, TokenizerError, type Tokenizer } from "@wikicorpus/core";
import { tokenizerRegistry } from "@wikicorpus/tokenizers";

// ── Tokenizer Layer ────────────────────────────────────────────────────────

export const TokenizerFrom = (tokenizer: Tokenizer) =>
  Layer.succeed(TokenizerService, tokenizer);

/** Resolve a tokenizer by registry name and language code. */
export const TokenizerLive = (name: string, lang: string) =>
  Layer.effect(
    TokenizerService,
    Effect.try({
      try: () => tokenizerRegistry.get(name, lang),
      catch: (cause) =>
        cause instanceof TokenizerError
          ? cause
          : new TokenizerError({ message: String(cause), cause }),
    }),
  );
