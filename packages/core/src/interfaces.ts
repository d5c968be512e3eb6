/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import { Context } from "effect";

// ── Tokenizer ──────────────────────────────────────────────────────────────

/**
 * A text tokenizer bound to one language. Instances hold no per-call state,
 * so a single one is shared by the scanner and all writers of a run.
 */
export interface Tokenizer {
  readonly name: string;
  readonly lang: string;
  tokenize(text: string): string[];
  /** Tokens joined with single spaces. */
  tokenizeToString(text: string): string;
}

export class TokenizerService extends Context.Tag("TokenizerService")<
  TokenizerService,
  Tokenizer
>() {}
