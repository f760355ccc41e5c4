/**
 * Library configuration — read from the environment once, then frozen.
 *
 * TENORCURVE_LOG_LEVEL   debug | info | warn | error | silent (default warn)
 * TENORCURVE_DAY_COUNT   ACT360 | ACT365 | ACT364, or ACT/360 etc. (default ACT365)
 *
 * Unrecognised values fall back to the default.
 */

import { DayCountConvention, isDayCountConvention } from "./dayCount.js";
import { createLogger, isLogLevel, type Logger, type LogLevel } from "./logger.js";

export interface LibraryConfig {
  readonly logLevel: LogLevel;
  readonly dayCountConvention: DayCountConvention;
}

export type Env = Readonly<Record<string, string | undefined>>;

export const DEFAULT_CONFIG: LibraryConfig = Object.freeze({
  logLevel: "warn",
  dayCountConvention: DayCountConvention.ACT365,
});

export function loadConfig(env: Env = process.env): LibraryConfig {
  const level = env.TENORCURVE_LOG_LEVEL?.trim().toLowerCase();
  const dayCount = env.TENORCURVE_DAY_COUNT?.trim().toUpperCase().replace("/", "");
  return Object.freeze({
    logLevel: level !== undefined && isLogLevel(level) ? level : DEFAULT_CONFIG.logLevel,
    dayCountConvention:
      dayCount !== undefined && isDayCountConvention(dayCount) ? dayCount : DEFAULT_CONFIG.dayCountConvention,
  });
}

let cached: LibraryConfig | undefined;
let cachedLogger: Logger | undefined;

/** Process-wide configuration, loaded on first use. */
export function libraryConfig(): LibraryConfig {
  cached ??= loadConfig();
  return cached;
}

/** Console logger at the configured level. */
export function defaultLogger(): Logger {
  cachedLogger ??= createLogger(libraryConfig().logLevel);
  return cachedLogger;
}

export function defaultDayCountConvention(): DayCountConvention {
  return libraryConfig().dayCountConvention;
}

/** Drop cached configuration so the next call re-reads the environment. For tests. */
export function resetLibraryConfig(): void {
  cached = undefined;
  cachedLogger = undefined;
}
