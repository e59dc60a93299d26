/**
 * Structured logging for frame passes.
 *
 * Provides a pretty console logger and a layer that installs it with a
 * minimum level taken from the graph config.
 */
import { Layer, Logger, LogLevel } from "effect";
import { isLogLevelName, type LogLevelName } from "@lumen/core";

// ── Pretty logger ──────────────────────────────────────────────────────────

function stringify(part: unknown): string {
  return typeof part === "string" ? part : JSON.stringify(part);
}

/** `[HH:MM:SS.mmm] LEVEL message key=value ...` */
export function formatLogLine(
  date: Date,
  label: string,
  message: unknown,
  annotations: Iterable<readonly [string, unknown]> = [],
): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  const msg = parts.map(stringify).join(" ");
  let tail = "";
  for (const [key, value] of annotations) tail += ` ${key}=${stringify(value)}`;
  return `[${ts}] ${lvl} ${msg}${tail}`;
}

export const prettyLogger = Logger.make(({ logLevel, message, date, annotations }) => {
  console.log(formatLogLine(date, logLevel.label, message, annotations));
});

/** Replace the default logger with `prettyLogger` and filter below `level`. */
export function prettyLogging(level: LogLevelName): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(LEVELS[level]),
  );
}

// ── Level names ────────────────────────────────────────────────────────────

const LEVELS: Record<LogLevelName, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
};

/** Case-insensitive; names outside `LOG_LEVEL_NAMES` fall back to info. */
export function parseLogLevel(level: string): LogLevel.LogLevel {
  const name = level.toLowerCase();
  return isLogLevelName(name) ? LEVELS[name] : LogLevel.Info;
}
