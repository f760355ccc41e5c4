/**
 * Zero-coupon schedule — the expiry and time-to-expiry of an instrument
 * started at a date and running for a tenor.
 */

import { endDateFromTenor, generateSequence, type SequenceOptions } from "./calendar.js";
import { defaultDayCountConvention } from "./config.js";
import type { YearFraction } from "./core.js";
import { yearFraction, type DayCountConvention } from "./dayCount.js";
import type { EpochTimestamp } from "./epochTimestamp.js";
import type { Tenor } from "./tenor.js";

export interface ZeroCouponScheduleInput {
  readonly start: EpochTimestamp;
  readonly tenor: Tenor;
  /** Defaults to the configured convention. */
  readonly convention?: DayCountConvention;
}

export class ZeroCouponSchedule {
  readonly start: EpochTimestamp;
  readonly tenor: Tenor;
  readonly convention: DayCountConvention;
  readonly expiry: EpochTimestamp;

  constructor(input: ZeroCouponScheduleInput) {
    this.start = input.start;
    this.tenor = input.tenor;
    this.convention = input.convention ?? defaultDayCountConvention();
    this.expiry = endDateFromTenor(this.start, this.tenor, this.convention);
  }

  /** Time from reference to expiry. NonPositiveYearFractionError once expired. */
  yearFractionFrom(reference: EpochTimestamp): YearFraction {
    return yearFraction(reference, this.expiry, this.convention);
  }

  /** Dates after start at the given frequency, ending on expiry. */
  paymentDates(frequency: Tenor, options: SequenceOptions = {}): EpochTimestamp[] {
    return generateSequence(this.start, frequency, this.convention, false, true, this.expiry, options);
  }
}
