/**
 * Structured logging.
 *
 * Library code only ever logs through Effect (`Effect.logInfo` etc.); which
 * logger receives those lines is decided by the Layer the caller provides.
 */
import { Layer, Logger, LogLevel } from "effect";

// ── Message formatting ─────────────────────────────────────────────────────

/** Effect hands loggers either a single value or the array of logged values. */
export function formatLogMessage(message: unknown): string {
  if (Array.isArray(message)) return message.map(formatLogMessage).join(" ");
  if (typeof message === "string") return message;
  return JSON.stringify(message);
}

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  console.log(`[${ts}] ${lvl} ${formatLogMessage(message)}`);
});

// ── Layers ─────────────────────────────────────────────────────────────────

/** Pretty console output at the given minimum level. */
export function loggingLayer(level: LogLevel.LogLevel = LogLevel.Info): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(level),
  );
}

/** Discard every log line. */
export const silentLogging: Layer.Layer<never> = Logger.replace(Logger.defaultLogger, Logger.none);

export interface CapturedLine {
  readonly level: string;
  readonly message: string;
}

/** Append every log line (down to debug) to `lines`. */
export function captureLogging(lines: CapturedLine[]): Layer.Layer<never> {
  const capture = Logger.make(({ logLevel, message }) => {
    lines.push({ level: logLevel.label, message: formatLogMessage(message) });
  });
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, capture),
    Logger.minimumLogLevel(LogLevel.Debug),
  );
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
