/**
 * EpochTimestamp — non-negative tick count since 1970-01-01T00:00:00Z
 * tagged with its precision. Immutable: conversions return new values.
 */

import { roundDiv } from "./core.js";
import { NegativeTimestampError } from "./errors.js";
import { isPrecision, Precision, precisionName, precisionScale } from "./precision.js";
import { TimeDelta } from "./timeDelta.js";
import { assert, neverReached, toBigInt, type IntegerLike } from "./validation.js";

/** Calendar fields resolved in UTC. month is 1–12, weekday 0=Sun..6=Sat. */
export interface CivilFields {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly weekday: number;
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

const MS_PER_SECOND = 1_000n;

export class EpochTimestamp {
  readonly ticks: bigint;
  readonly precision: Precision;

  constructor(ticks: IntegerLike, precision: Precision) {
    const t = toBigInt(ticks, "ticks");
    assert(isPrecision(precision), `Unknown precision: ${String(precision)}`, { precision });
    if (t < 0n) throw new NegativeTimestampError(t);
    this.ticks = t;
    this.precision = precision;
  }

  /** Sub-millisecond precision is zero-filled. */
  static fromDate(date: Date, precision: Precision = Precision.MILLISECONDS): EpochTimestamp {
    const ms = date.getTime();
    assert(Number.isFinite(ms), "Invalid Date");
    return new EpochTimestamp(BigInt(ms), Precision.MILLISECONDS).convertPrecision(precision);
  }

  /** Midnight UTC of the given calendar date. month is 1–12. */
  static fromCivil(
    year: number,
    month: number,
    day: number,
    precision: Precision = Precision.SECONDS
  ): EpochTimestamp {
    // years 0-99 stay literal (Date.UTC maps them to 1900-1999)
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    return EpochTimestamp.fromDate(date, precision);
  }

  /** round(ticks * target / current), half away from zero. */
  convertPrecision(target: Precision): EpochTimestamp {
    if (target === this.precision) return this;
    const ticks = roundDiv(this.ticks * precisionScale(target), precisionScale(this.precision));
    return new EpochTimestamp(ticks, target);
  }

  /** The delta is totalled in this timestamp's own precision before being added. */
  applyDelta(delta: TimeDelta): EpochTimestamp {
    return new EpochTimestamp(this.ticks + delta.totalIn(this.precision), this.precision);
  }

  /** Whole seconds are resolved; sub-second ticks are rounded like any precision change. */
  civilFields(): CivilFields {
    const seconds = this.convertPrecision(Precision.SECONDS).ticks;
    const date = new Date(Number(seconds * MS_PER_SECOND));
    assert(Number.isFinite(date.getTime()), "Timestamp is outside the representable calendar range", {
      ticks: this.ticks.toString(),
      precision: precisionName(this.precision),
    });
    return {
      year: date.getUTCFullYear(),
      month: date.getUTCMonth() + 1,
      day: date.getUTCDate(),
      weekday: date.getUTCDay(),
      hours: date.getUTCHours(),
      minutes: date.getUTCMinutes(),
      seconds: date.getUTCSeconds(),
    };
  }

  isWeekend(): boolean {
    const { weekday } = this.civilFields();
    return weekday === 0 || weekday === 6;
  }

  /** Calendar-date equality only; time of day and precision are ignored. */
  isHoliday(holidays: readonly EpochTimestamp[]): boolean {
    const { year, month, day } = this.civilFields();
    return holidays.some((h) => {
      const c = h.civilFields();
      return c.day === day && c.month === month && c.year === year;
    });
  }

  /** Exact: every precision divides a nanosecond count evenly. */
  toNanoseconds(): bigint {
    return this.ticks * (precisionScale(Precision.NANOSECONDS) / precisionScale(this.precision));
  }

  /** Negative if this is earlier than other, zero for the same instant. */
  compare(other: EpochTimestamp): number {
    const a = this.toNanoseconds();
    const b = other.toNanoseconds();
    return a < b ? -1 : a > b ? 1 : 0;
  }

  /** Same instant, whatever the precisions. */
  equals(other: EpochTimestamp): boolean {
    return this.compare(other) === 0;
  }

  /** Rounded to the nearest millisecond. */
  toDate(): Date {
    return new Date(Number(this.convertPrecision(Precision.MILLISECONDS).ticks));
  }

  /** "YYYY-MM-DD" in UTC. */
  toISODate(): string {
    const { year, month, day } = this.civilFields();
    return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
  }

  toJSON(): { ticks: string; precision: string } {
    return { ticks: this.ticks.toString(), precision: precisionName(this.precision) };
  }
}

/**
 * Difference end - start expressed in unit. Only the field matching unit
 * is populated (SECONDS sets seconds, NANOSECONDS sets nanoseconds, ...).
 */
export function timedeltaBetween(start: EpochTimestamp, end: EpochTimestamp, unit: Precision): TimeDelta {
  const delta = end.convertPrecision(unit).ticks - start.convertPrecision(unit).ticks;
  switch (unit) {
    case Precision.SECONDS:
      return new TimeDelta({ seconds: delta });
    case Precision.MILLISECONDS:
      return new TimeDelta({ milliseconds: delta });
    case Precision.MICROSECONDS:
      return new TimeDelta({ microseconds: delta });
    case Precision.NANOSECONDS:
      return new TimeDelta({ nanoseconds: delta });
    default:
      return neverReached(`Unknown precision: ${String(unit)}`);
  }
}
