/**
 * TimeDelta — signed duration split over seven independent unit fields.
 * Fields are never normalised: 30 hours stays 30 hours.
 */

import { roundDiv, SECONDS_PER_DAY, SECONDS_PER_HOUR, SECONDS_PER_MINUTE } from "./core.js";
import { Precision } from "./precision.js";
import { neverReached, toBigInt, type IntegerLike } from "./validation.js";

export interface TimeDeltaFields<T = bigint> {
  readonly days: T;
  readonly hours: T;
  readonly minutes: T;
  readonly seconds: T;
  readonly milliseconds: T;
  readonly microseconds: T;
  readonly nanoseconds: T;
}

const THOUSAND = 1_000n;
const MILLION = 1_000_000n;
const BILLION = 1_000_000_000n;

export class TimeDelta {
  private days: bigint;
  private hours: bigint;
  private minutes: bigint;
  private seconds: bigint;
  private milliseconds: bigint;
  private microseconds: bigint;
  private nanoseconds: bigint;

  constructor(fields: Partial<TimeDeltaFields<IntegerLike>> = {}) {
    this.days = toBigInt(fields.days ?? 0n, "days");
    this.hours = toBigInt(fields.hours ?? 0n, "hours");
    this.minutes = toBigInt(fields.minutes ?? 0n, "minutes");
    this.seconds = toBigInt(fields.seconds ?? 0n, "seconds");
    this.milliseconds = toBigInt(fields.milliseconds ?? 0n, "milliseconds");
    this.microseconds = toBigInt(fields.microseconds ?? 0n, "microseconds");
    this.nanoseconds = toBigInt(fields.nanoseconds ?? 0n, "nanoseconds");
  }

  static of(fields: Partial<TimeDeltaFields<IntegerLike>>): TimeDelta {
    return new TimeDelta(fields);
  }

  static zero(): TimeDelta {
    return new TimeDelta();
  }

  /** Days, hours, minutes and seconds only; sub-second fields excluded. */
  private wholeSeconds(): bigint {
    return (
      this.days * SECONDS_PER_DAY + this.hours * SECONDS_PER_HOUR + this.minutes * SECONDS_PER_MINUTE + this.seconds
    );
  }

  /** Each sub-second field is rounded to whole seconds on its own before summing. */
  totalSeconds(): bigint {
    return (
      this.wholeSeconds() +
      roundDiv(this.microseconds, MILLION) +
      roundDiv(this.milliseconds, THOUSAND) +
      roundDiv(this.nanoseconds, BILLION)
    );
  }

  totalMilliseconds(): bigint {
    return (
      this.wholeSeconds() * THOUSAND +
      this.milliseconds +
      roundDiv(this.microseconds, THOUSAND) +
      roundDiv(this.nanoseconds, MILLION)
    );
  }

  totalMicroseconds(): bigint {
    const totalMs = this.wholeSeconds() * THOUSAND + this.milliseconds;
    return totalMs * THOUSAND + this.microseconds + roundDiv(this.nanoseconds, THOUSAND);
  }

  /** Exact: no field is finer than a nanosecond. */
  totalNanoseconds(): bigint {
    const totalUs = (this.wholeSeconds() * THOUSAND + this.milliseconds) * THOUSAND + this.microseconds;
    return totalUs * THOUSAND + this.nanoseconds;
  }

  /** Total expressed in the unit of the given precision. */
  totalIn(precision: Precision): bigint {
    switch (precision) {
      case Precision.SECONDS:
        return this.totalSeconds();
      case Precision.MILLISECONDS:
        return this.totalMilliseconds();
      case Precision.MICROSECONDS:
        return this.totalMicroseconds();
      case Precision.NANOSECONDS:
        return this.totalNanoseconds();
      default:
        return neverReached(`Unknown precision: ${String(precision)}`);
    }
  }

  fields(): TimeDeltaFields {
    return {
      days: this.days,
      hours: this.hours,
      minutes: this.minutes,
      seconds: this.seconds,
      milliseconds: this.milliseconds,
      microseconds: this.microseconds,
      nanoseconds: this.nanoseconds,
    };
  }

  setDays(n: IntegerLike): void {
    this.days = toBigInt(n, "days");
  }

  setHours(n: IntegerLike): void {
    this.hours = toBigInt(n, "hours");
  }

  setMinutes(n: IntegerLike): void {
    this.minutes = toBigInt(n, "minutes");
  }

  setSeconds(n: IntegerLike): void {
    this.seconds = toBigInt(n, "seconds");
  }

  setMilliseconds(n: IntegerLike): void {
    this.milliseconds = toBigInt(n, "milliseconds");
  }

  setMicroseconds(n: IntegerLike): void {
    this.microseconds = toBigInt(n, "microseconds");
  }

  setNanoseconds(n: IntegerLike): void {
    this.nanoseconds = toBigInt(n, "nanoseconds");
  }

  clone(): TimeDelta {
    return new TimeDelta(this.fields());
  }

  /** bigint has no JSON form; fields are emitted as decimal strings. */
  toJSON(): TimeDeltaFields<string> {
    const f = this.fields();
    return {
      days: f.days.toString(),
      hours: f.hours.toString(),
      minutes: f.minutes.toString(),
      seconds: f.seconds.toString(),
      milliseconds: f.milliseconds.toString(),
      microseconds: f.microseconds.toString(),
      nanoseconds: f.nanoseconds.toString(),
    };
  }
}
