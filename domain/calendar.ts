/**
 * domain/calendar.ts
 * Tenor-driven date arithmetic: period counts, expiry dates, ordered
 * sequences and a weekend/holiday-list business day check.
 *
 * Not a calendar library: no time zones, civil dates are UTC.
 */

import { defaultLogger } from "./config.js";
import { roundHalfAwayFromZero } from "./core.js";
import type { DayCountConvention } from "./dayCount.js";
import { EpochTimestamp, timedeltaBetween } from "./epochTimestamp.js";
import type { Logger } from "./logger.js";
import { Precision, precisionName } from "./precision.js";
import { tenorAsDelta, type Tenor } from "./tenor.js";
import { TimeDelta } from "./timeDelta.js";

export interface SequenceOptions {
  readonly logger?: Logger;
}

const ONE_DAY = new TimeDelta({ days: 1 });

/** Whole frequency periods between start and end, rounded to nearest. */
export function periodsBetween(
  start: EpochTimestamp,
  end: EpochTimestamp,
  frequency: Tenor,
  convention: DayCountConvention
): number {
  const span = timedeltaBetween(start, end, Precision.SECONDS).totalSeconds();
  const period = tenorAsDelta(frequency, convention).totalSeconds();
  return roundHalfAwayFromZero(Number(span) / Number(period));
}

/** start moved forward by the tenor's day count, in start's precision. */
export function endDateFromTenor(
  start: EpochTimestamp,
  tenor: Tenor,
  convention: DayCountConvention
): EpochTimestamp {
  return start.applyDelta(tenorAsDelta(tenor, convention));
}

/**
 * Ascending copy at NANOSECONDS precision. Timestamps denoting the same
 * instant collapse into one, whatever their original precision.
 */
export function orderSequence(
  dates: readonly EpochTimestamp[],
  options: SequenceOptions = {}
): EpochTimestamp[] {
  const unique = new Set<bigint>(dates.map((d) => d.toNanoseconds()));
  const collapsed = dates.length - unique.size;
  if (collapsed > 0) {
    (options.logger ?? defaultLogger()).debug("orderSequence collapsed duplicate instants", {
      input: dates.length,
      collapsed,
    });
  }
  return [...unique]
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((ns) => new EpochTimestamp(ns, Precision.NANOSECONDS));
}

/**
 * Dates stepping from start by the frequency tenor.
 *
 * With n = periodsBetween(start, end), the interior holds start + k·step
 * for k = 1..n-1. start is prepended and end appended when requested;
 * n <= 1 yields no interior point.
 */
export function generateSequence(
  start: EpochTimestamp,
  frequency: Tenor,
  convention: DayCountConvention,
  includeStart: boolean,
  includeEnd: boolean,
  end: EpochTimestamp,
  options: SequenceOptions = {}
): EpochTimestamp[] {
  const step = tenorAsDelta(frequency, convention);
  const n = periodsBetween(start, end, frequency, convention);
  if (n <= 1) {
    (options.logger ?? defaultLogger()).warn("generateSequence produced no interior dates", {
      periods: n,
      frequency,
      start: start.ticks.toString(),
      end: end.ticks.toString(),
      precision: precisionName(start.precision),
    });
  }

  const output: EpochTimestamp[] = [];
  let next = start;
  for (let i = 1; i < n; i++) {
    next = next.applyDelta(step);
    output.push(next);
  }
  if (includeStart) output.unshift(start);
  if (includeEnd) output.push(end);
  return output;
}

/** Not a Saturday or Sunday and not on any listed holiday date. */
export function isBusinessDay(date: EpochTimestamp, holidays: readonly EpochTimestamp[] = []): boolean {
  return !date.isWeekend() && !date.isHoliday(holidays);
}

/** Following convention: date itself if a business day, else the next one (time of day kept). */
export function adjustToNextBusinessDay(
  date: EpochTimestamp,
  holidays: readonly EpochTimestamp[] = []
): EpochTimestamp {
  let cur = date;
  while (!isBusinessDay(cur, holidays)) cur = cur.applyDelta(ONE_DAY);
  return cur;
}
