/**
 * Logger port. Operations that take a silent decision (collapsing
 * duplicates, producing an empty schedule) report it here.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/** Minimal console-compatible sink; `console` satisfies it. */
export interface LogSink {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Level-filtered logger writing to sink (console by default). */
export function createLogger(level: LogLevel, sink: LogSink = console): Logger {
  const emit =
    (at: Exclude<LogLevel, "silent">) =>
    (message: string, context?: Record<string, unknown>): void => {
      if (RANK[at] < RANK[level]) return;
      if (context === undefined) sink[at](`[tenorcurve] ${message}`);
      else sink[at](`[tenorcurve] ${message}`, context);
    };
  return { debug: emit("debug"), info: emit("info"), warn: emit("warn"), error: emit("error") };
}

export const silentLogger: Logger = createLogger("silent");
