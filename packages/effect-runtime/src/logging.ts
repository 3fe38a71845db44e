/**
 * Structured logging for sweep generation.
 *
 * Provides a console logger that prints log annotations alongside the
 * message, and log-level parsing for runtime config.
 */
import { Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function renderMessage(message: unknown): string {
  if (typeof message === "string") return message;
  if (Array.isArray(message)) return message.map(renderMessage).join(" ");
  return JSON.stringify(message);
}

export function formatLogLine(
  logLevel: LogLevel.LogLevel,
  message: unknown,
  date: Date,
  annotations: Iterable<readonly [string, unknown]>,
): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const tags = [...annotations].map(([k, v]) => `${k}=${renderMessage(v)}`);
  const suffix = tags.length > 0 ? ` (${tags.join(" ")})` : "";
  return `[${ts}] ${lvl} ${renderMessage(message)}${suffix}`;
}

export const prettyLogger = Logger.make(({ logLevel, message, date, annotations }) => {
  const line = formatLogLine(logLevel, message, date, annotations);
  if (LogLevel.greaterThanEqual(logLevel, LogLevel.Warning)) {
    console.error(line);
  } else {
    console.log(line);
  }
});

// ── Log level from string ──────────────────────────────────────────────────

export const LOG_LEVELS = ["debug", "info", "warn", "warning", "error"] as const;

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
