import { describe, expect, it, vi } from "vitest";
import {
  adjustToNextBusinessDay,
  endDateFromTenor,
  generateSequence,
  isBusinessDay,
  orderSequence,
  periodsBetween,
} from "./calendar.js";
import { EpochTimestamp } from "./epochTimestamp.js";
import { Precision } from "./precision.js";
import { Tenor } from "./tenor.js";
import { DayCountConvention } from "./dayCount.js";
import { TimeDelta } from "./timeDelta.js";
import type { Logger } from "./logger.js";

const { ACT360, ACT365 } = DayCountConvention;

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

const isoDates = (dates: readonly EpochTimestamp[]) => dates.map((d) => d.toISODate());

describe("periodsBetween", () => {
  it("rounds the ratio of spans", () => {
    const start = EpochTimestamp.fromCivil(2024, 1, 1);
    const end = EpochTimestamp.fromCivil(2024, 4, 1); // 91 days
    expect(periodsBetween(start, end, Tenor._1M, ACT365)).toBe(3);
    expect(periodsBetween(start, end, Tenor._1W, ACT365)).toBe(13);
  });
});

describe("endDateFromTenor", () => {
  it("adds the tenor's days and keeps precision", () => {
    const start = EpochTimestamp.fromCivil(2024, 1, 1, Precision.MICROSECONDS);
    const end = endDateFromTenor(start, Tenor._1Y, ACT360);
    expect(end.toISODate()).toBe("2024-12-26");
    expect(end.precision).toBe(Precision.MICROSECONDS);
    expect(start.toISODate()).toBe("2024-01-01");
  });
});

describe("orderSequence", () => {
  it("sorts ascending and collapses duplicate instants", () => {
    const t1 = EpochTimestamp.fromCivil(2024, 1, 1);
    const t2 = EpochTimestamp.fromCivil(2024, 1, 2, Precision.MILLISECONDS);
    const t3 = EpochTimestamp.fromCivil(2024, 1, 3, Precision.NANOSECONDS);
    const t1Duplicate = new EpochTimestamp(t1.ticks * 1_000n, Precision.MILLISECONDS);
    const logger = spyLogger();

    const ordered = orderSequence([t3, t1, t2, t1Duplicate], { logger });

    expect(ordered).toHaveLength(3);
    expect(isoDates(ordered)).toEqual(["2024-01-01", "2024-01-02", "2024-01-03"]);
    expect(ordered.every((d) => d.precision === Precision.NANOSECONDS)).toBe(true);
    expect(ordered[0].ticks < ordered[1].ticks && ordered[1].ticks < ordered[2].ticks).toBe(true);
    expect(logger.debug).toHaveBeenCalledWith("orderSequence collapsed duplicate instants", {
      input: 4,
      collapsed: 1,
    });
  });

  it("does not log without duplicates", () => {
    const logger = spyLogger();
    expect(orderSequence([], { logger })).toEqual([]);
    expect(logger.debug).not.toHaveBeenCalled();
  });
});

describe("generateSequence", () => {
  const start = EpochTimestamp.fromCivil(2024, 1, 1);
  const end = EpochTimestamp.fromCivil(2024, 4, 1);

  it("monthly ACT/365 from 2024-01-01 to 2024-04-01 yields 4 dates", () => {
    const seq = generateSequence(start, Tenor._1M, ACT365, true, true, end);
    expect(isoDates(seq)).toEqual(["2024-01-01", "2024-01-31", "2024-03-01", "2024-04-01"]);
    expect(seq[0]).toBe(start);
    expect(seq[3]).toBe(end);
  });

  it("interior only when both flags are off", () => {
    const seq = generateSequence(start, Tenor._1M, ACT365, false, false, end);
    expect(isoDates(seq)).toEqual(["2024-01-31", "2024-03-01"]);
  });

  it("n <= 1 yields no interior point and warns", () => {
    const near = start.applyDelta(new TimeDelta({ days: 20 }));
    const logger = spyLogger();

    expect(generateSequence(start, Tenor._1M, ACT360, false, false, near, { logger })).toEqual([]);
    expect(isoDates(generateSequence(start, Tenor._1M, ACT360, true, true, near, { logger }))).toEqual([
      "2024-01-01",
      "2024-01-21",
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      "generateSequence produced no interior dates",
      expect.objectContaining({ periods: 1, frequency: "1M" })
    );
  });

  it("logs raw ticks for instants past the Date range", () => {
    const far = new EpochTimestamp(10n ** 25n, Precision.NANOSECONDS);
    const later = new EpochTimestamp(10n ** 25n + 1n, Precision.NANOSECONDS);
    const logger = spyLogger();

    const seq = generateSequence(far, Tenor._1M, ACT365, true, true, later, { logger });
    expect(seq).toEqual([far, later]);
    expect(logger.warn).toHaveBeenCalledWith("generateSequence produced no interior dates", {
      periods: 0,
      frequency: "1M",
      start: "10000000000000000000000000",
      end: "10000000000000000000000001",
      precision: "NANOSECONDS",
    });
  });

  it("end before start yields no interior point", () => {
    const logger = spyLogger();
    const seq = generateSequence(end, Tenor._1W, ACT365, false, true, start, { logger });
    expect(seq).toEqual([start]);
  });
});

describe("business days", () => {
  const saturday = EpochTimestamp.fromCivil(2024, 1, 6);
  const monday = EpochTimestamp.fromCivil(2024, 1, 8);

  it("isBusinessDay — weekend and holiday list", () => {
    expect(isBusinessDay(saturday)).toBe(false);
    expect(isBusinessDay(monday)).toBe(true);
    expect(isBusinessDay(monday, [monday])).toBe(false);
  });

  it("adjustToNextBusinessDay skips weekend and holidays", () => {
    expect(adjustToNextBusinessDay(saturday).toISODate()).toBe("2024-01-08");
    expect(adjustToNextBusinessDay(saturday, [monday]).toISODate()).toBe("2024-01-09");
    expect(adjustToNextBusinessDay(monday)).toBe(monday);
  });
});
