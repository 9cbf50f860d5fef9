/**
 * Structured logging and tracing integration.
 *
 * A console logger that prints one line per entry with the entry's
 * annotations appended, plus span helpers and log-level parsing for the CLI.
 */
import { Effect, HashMap, Layer, Logger, LogLevel } from "effect";
import type { LogLevelName } from "@bytelevel/core";

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date, annotations }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  const msg = parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
  const tags = [...HashMap.toEntries(annotations)]
    .map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v)}`)
    .join(" ");
  console.error(`[${ts}] ${lvl} ${msg}${tags ? ` ${tags}` : ""}`);
});

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
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}

export function logLevelName(level: string): LogLevelName {
  switch (parseLogLevel(level)) {
    case LogLevel.Debug: return "debug";
    case LogLevel.Warning: return "warn";
    case LogLevel.Error: return "error";
    case LogLevel.None: return "none";
    default: return "info";
  }
}

// ── Layer ──────────────────────────────────────────────────────────────────

/** Swap the default logger for `prettyLogger` and filter below `level`. */
export function loggingLayer(level: LogLevel.LogLevel): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(level),
  );
}
