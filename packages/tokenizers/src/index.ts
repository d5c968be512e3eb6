/**
 * @wikicorpus/tokenizers -- tokenizer implementations for corpus building.
 *
 * Provides a language-aware segmenter tokenizer, a plain whitespace
 * tokenizer, and a pre-populated registry so the rest of the system can look
 * up tokenizers by name.
 */
import { Registry, type Tokenizer } from "@wikicorpus/core";
import { SegmenterTokenizer } from "./segmenter.js";
import { WhitespaceTokenizer } from "./whitespace.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { SegmenterTokenizer } from "./segmenter.js";
export { WhitespaceTokenizer } from "./whitespace.js";

// ── Tokenizer registry ────────────────────────────────────────────────────

/**
 * Global tokenizer registry. Factories take the language code.
 *
 * Pre-registered implementations:
 * - `"segmenter"` -- word segmentation via `Intl.Segmenter` (default)
 * - `"whitespace"` -- split on whitespace only
 *
 * Usage:
 * ```ts
 * const tok = tokenizerRegistry.get("segmenter", "de");
 * ```
 */
export const tokenizerRegistry = new Registry<Tokenizer, [lang: string]>("tokenizer");

tokenizerRegistry.register("segmenter", (lang) => new SegmenterTokenizer(lang));
tokenizerRegistry.register("whitespace", (lang) => new WhitespaceTokenizer(lang));

export const DEFAULT_TOKENIZER = "segmenter";
