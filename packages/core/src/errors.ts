/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class TokenizerError extends Data.TaggedError("TokenizerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class SourceError extends Data.TaggedError("SourceError")<{
  readonly message: string;
  readonly path?: string;
  /** 1-based line number of the offending record. */
  readonly line?: number;
  readonly cause?: unknown;
}> {}

export class CorpusError extends Data.TaggedError("CorpusError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
