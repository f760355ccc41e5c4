import { afterEach, describe, expect, it, vi } from "vitest";
import { ZeroCouponSchedule } from "./zeroCouponSchedule.js";
import { EpochTimestamp } from "./epochTimestamp.js";
import { Tenor } from "./tenor.js";
import { DayCountConvention } from "./dayCount.js";
import { NonPositiveYearFractionError } from "./errors.js";
import { resetLibraryConfig } from "./config.js";

const start = EpochTimestamp.fromCivil(2024, 1, 1);

describe("ZeroCouponSchedule", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetLibraryConfig();
  });

  const sixMonths = new ZeroCouponSchedule({ start, tenor: Tenor._6M, convention: DayCountConvention.ACT360 });

  it("expiry is start plus the tenor", () => {
    expect(sixMonths.expiry.toISODate()).toBe("2024-06-29");
  });

  it("year fraction to expiry", () => {
    expect(sixMonths.yearFractionFrom(start)).toBeCloseTo(0.5, 12);
    expect(sixMonths.yearFractionFrom(EpochTimestamp.fromCivil(2024, 5, 30))).toBeCloseTo(30 / 360, 12);
  });

  it("expired schedule rejects the year fraction", () => {
    expect(() => sixMonths.yearFractionFrom(EpochTimestamp.fromCivil(2024, 7, 1))).toThrow(
      NonPositiveYearFractionError
    );
  });

  it("payment dates end on expiry", () => {
    expect(sixMonths.paymentDates(Tenor._3M).map((d) => d.toISODate())).toEqual(["2024-03-31", "2024-06-29"]);
  });

  it("falls back to the configured convention", () => {
    vi.stubEnv("TENORCURVE_DAY_COUNT", "ACT/364");
    resetLibraryConfig();
    const oneYear = new ZeroCouponSchedule({ start, tenor: Tenor._1Y });
    expect(oneYear.convention).toBe("ACT364");
    expect(oneYear.expiry.toISODate()).toBe("2024-12-30");
  });
});
