/**
 * Tenors — named standard maturities mapped to day counts.
 * Day, week and business-day-offset tenors are fixed; month and year
 * tenors scale with the day-count convention.
 */

import { daysPerMonth, daysPerYear, type DayCountConvention } from "./dayCount.js";
import { UndefinedTenorError } from "./errors.js";
import { TimeDelta } from "./timeDelta.js";

export const Tenor = {
  ON: "ON",
  TN: "TN",
  SN: "SN",
  _1W: "1W",
  _2W: "2W",
  _1M: "1M",
  _3M: "3M",
  _6M: "6M",
  _1Y: "1Y",
  _5Y: "5Y",
  _10Y: "10Y",
  _20Y: "20Y",
  _30Y: "30Y",
} as const;

export type Tenor = (typeof Tenor)[keyof typeof Tenor];

interface TenorLength {
  readonly unit: "day" | "month" | "year";
  readonly count: number;
}

const LENGTHS: Record<Tenor, TenorLength> = {
  ON: { unit: "day", count: 1 },
  TN: { unit: "day", count: 2 },
  SN: { unit: "day", count: 3 },
  "1W": { unit: "day", count: 7 },
  "2W": { unit: "day", count: 14 },
  "1M": { unit: "month", count: 1 },
  "3M": { unit: "month", count: 3 },
  "6M": { unit: "month", count: 6 },
  "1Y": { unit: "year", count: 1 },
  "5Y": { unit: "year", count: 5 },
  "10Y": { unit: "year", count: 10 },
  "20Y": { unit: "year", count: 20 },
  "30Y": { unit: "year", count: 30 },
};

/** Shortest to longest. */
export const TENORS: readonly Tenor[] = Object.values(Tenor);

function lengthOf(tenor: Tenor): TenorLength {
  if (!Object.hasOwn(LENGTHS, tenor)) throw new UndefinedTenorError(tenor);
  return LENGTHS[tenor];
}

export function isTenor(value: unknown): value is Tenor {
  return typeof value === "string" && Object.hasOwn(LENGTHS, value);
}

/** Display name, e.g. "1M". */
export function tenorName(tenor: Tenor): string {
  lengthOf(tenor);
  return tenor;
}

/** Accepts "1M", "1m" or the constant key "_1M". */
export function parseTenor(text: string): Tenor {
  const key = text.trim().toUpperCase().replace(/^_/, "");
  if (isTenor(key)) return key;
  throw new UndefinedTenorError(text);
}

export function tenorInDays(tenor: Tenor, convention: DayCountConvention): number {
  const { unit, count } = lengthOf(tenor);
  const perYear = daysPerYear(convention);
  switch (unit) {
    case "day":
      return count;
    case "month":
      return count * daysPerMonth(convention);
    case "year":
      return count * perYear;
  }
}

/** TimeDelta carrying only the day count. */
export function tenorAsDelta(tenor: Tenor, convention: DayCountConvention): TimeDelta {
  return new TimeDelta({ days: tenorInDays(tenor, convention) });
}

/** Real division: a 6M tenor is 180/360 = 0.5, not 0. */
export function tenorYearFraction(tenor: Tenor, convention: DayCountConvention): number {
  return tenorInDays(tenor, convention) / daysPerYear(convention);
}
