/**
 * Structured logging and tracing integration.
 *
 * A compact console logger and log-level parsing for the long-running passes
 * (vocabulary refinement, token training).
 */
import { Effect, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date, annotations }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const parts: unknown[] = Array.isArray(message) ? message : [message];
  const msg = parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
  let ann = "";
  for (const [key, value] of annotations) ann += ` ${key}=${String(value)}`;
  console.log(`[${ts}] ${lvl} ${msg}${ann}`);
});

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

// ── Wiring ─────────────────────────────────────────────────────────────────

/** Swap in the pretty logger and set the minimum level for `effect`. */
export function withLogging(level: string) {
  const layer = Logger.replace(Logger.defaultLogger, prettyLogger);
  return <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    effect.pipe(
      Logger.withMinimumLogLevel(parseLogLevel(level)),
      Effect.provide(layer),
    );
}

/** Layer that silences all logging; used by tests and library callers. */
export const SilentLogging = Logger.replace(Logger.defaultLogger, Logger.none);
