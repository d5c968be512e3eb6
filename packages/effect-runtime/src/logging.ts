/**
 * Structured logging and tracing integration.
 *
 * Provides a console logger in `[time] LEVEL message` form, a layer that
 * installs it in place of Effect's default logger, and span helpers.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function renderPart(part: unknown): string {
  return typeof part === "string" ? part : JSON.stringify(part);
}

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  console.log(`[${ts}] ${lvl} ${parts.map(renderPart).join(" ")}`);
});

export const PrettyLoggerLive = Logger.replace(Logger.defaultLogger, prettyLogger);

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}

/** Pretty logger plus a minimum level, as one layer. */
export function loggingLayer(level: string): Layer.Layer<never> {
  return Layer.merge(PrettyLoggerLive, Logger.minimumLogLevel(parseLogLevel(level)));
}
