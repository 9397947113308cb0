/**
 * Console logger with a process-wide verbosity threshold.
 *
 * Lines look like `[WARN] [download] GET ... failed {"attempt":1}` and go to
 * stderr so stdout stays free for summaries.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "critical";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "critical"];

const DEFAULT_LEVEL: LogLevel = "warn";

let threshold = LEVELS.indexOf(DEFAULT_LEVEL);

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  critical(msg: string, data?: Record<string, unknown>): void;
}

/**
 * Line sink, replaceable in tests.
 */
export type LogSink = (line: string) => void;

let sink: LogSink = (line) => console.error(line);

export function setLogSink(next: LogSink | null): void {
  sink = next ?? ((line) => console.error(line));
}

export function setLogLevel(level: LogLevel): void {
  threshold = LEVELS.indexOf(level);
}

export function getLogLevel(): LogLevel {
  return LEVELS[threshold];
}

/**
 * Move the threshold by `delta` steps; positive means more verbose.
 * Clamped to the debug..critical range.
 */
export function adjustVerbosity(delta: number): LogLevel {
  const next = Math.min(Math.max(threshold - delta, 0), LEVELS.length - 1);
  threshold = next;
  return LEVELS[next];
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= threshold;
}

export function formatLine(
  level: LogLevel,
  scope: string | null,
  msg: string,
  data?: Record<string, unknown>,
): string {
  const prefix = `[${level.toUpperCase()}]${scope ? ` [${scope}]` : ""}`;
  return data ? `${prefix} ${msg} ${JSON.stringify(data)}` : `${prefix} ${msg}`;
}

/**
 * Create a logger whose lines carry `scope`.
 */
export function createLogger(scope: string | null = null): Logger {
  const emit = (level: LogLevel) => (msg: string, data?: Record<string, unknown>) => {
    if (isLevelEnabled(level)) {
      sink(formatLine(level, scope, msg, data));
    }
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    critical: emit("critical"),
  };
}

export const log = createLogger();
