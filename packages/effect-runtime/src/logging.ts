/**
 * Structured console logging for the CLI.
 */
import { HashMap, Layer, Logger, LogLevel } from "effect";

export type LineSink = (line: string) => void;

export function formatLogLine(level: LogLevel.LogLevel, message: unknown, date: Date, annotations: ReadonlyArray<readonly [string, unknown]> = []): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = level.label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  const msg = parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
  const ann = annotations.map(([k, v]) => ` ${k}=${typeof v === "string" ? v : JSON.stringify(v)}`).join("");
  return `[${ts}] ${lvl} ${msg}${ann}`;
}

/** Logger writing one formatted line per entry to `sink` (stderr by default). */
export const makePrettyLogger = (sink: LineSink = (line) => console.error(line)) =>
  Logger.make(({ logLevel, message, date, annotations }) => {
    sink(formatLogLine(logLevel, message, date, [...HashMap.toEntries(annotations)]));
  });

export const prettyLogger = makePrettyLogger();

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "trace": return LogLevel.Trace;
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none":
    case "off": return LogLevel.None;
    default: return LogLevel.Info;
  }
}

/** Replace the default logger and set the minimum level in one layer. */
export function LoggingLive(level: string, sink?: LineSink): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, sink ? makePrettyLogger(sink) : prettyLogger),
    Logger.minimumLogLevel(parseLogLevel(level)),
  );
}
