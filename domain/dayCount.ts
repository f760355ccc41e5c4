/**
 * Day-count conventions and year fractions.
 */

import { asYearFraction, type YearFraction } from "./core.js";
import { timedeltaBetween, type EpochTimestamp } from "./epochTimestamp.js";
import { NonPositiveYearFractionError, UndefinedDayCountConventionError } from "./errors.js";
import { Precision } from "./precision.js";

export const DayCountConvention = {
  ACT360: "ACT360",
  ACT365: "ACT365",
  ACT364: "ACT364",
} as const;

export type DayCountConvention = (typeof DayCountConvention)[keyof typeof DayCountConvention];

interface ConventionSpec {
  readonly name: string;
  readonly daysPerYear: number;
}

const CONVENTIONS: Record<DayCountConvention, ConventionSpec> = {
  ACT360: { name: "ACT/360", daysPerYear: 360 },
  ACT365: { name: "ACT/365", daysPerYear: 365 },
  ACT364: { name: "ACT/364", daysPerYear: 364 },
};

const NANOS_PER_DAY = 86_400 * 1e9;

function specOf(convention: DayCountConvention): ConventionSpec {
  if (!Object.hasOwn(CONVENTIONS, convention)) throw new UndefinedDayCountConventionError(convention);
  return CONVENTIONS[convention];
}

export function isDayCountConvention(value: unknown): value is DayCountConvention {
  return typeof value === "string" && Object.hasOwn(CONVENTIONS, value);
}

/** Display name, e.g. "ACT/365". */
export function dayCountName(convention: DayCountConvention): string {
  return specOf(convention).name;
}

export function daysPerYear(convention: DayCountConvention): number {
  return specOf(convention).daysPerYear;
}

/** round(daysPerYear / 12); 30 for every supported convention. */
export function daysPerMonth(convention: DayCountConvention): number {
  return Math.round(daysPerYear(convention) / 12);
}

/** Accepts the identifier ("ACT365") or the display name ("ACT/365"), case-insensitive. */
export function parseDayCountConvention(text: string): DayCountConvention {
  const key = text.trim().toUpperCase().replace("/", "");
  if (isDayCountConvention(key)) return key;
  throw new UndefinedDayCountConventionError(text);
}

/**
 * Elapsed nanoseconds over a convention year. Zero when start and end
 * coincide; NonPositiveYearFractionError when end precedes start.
 */
export function yearFraction(
  start: EpochTimestamp,
  end: EpochTimestamp,
  convention: DayCountConvention
): YearFraction {
  const year = daysPerYear(convention) * NANOS_PER_DAY;
  const elapsed = timedeltaBetween(start, end, Precision.NANOSECONDS).totalNanoseconds();
  const fraction = Number(elapsed) / year;
  if (fraction < 0) throw new NonPositiveYearFractionError(fraction);
  return asYearFraction(fraction);
}
