import { describe, expect, it } from "vitest";
import {
  Tenor,
  TENORS,
  parseTenor,
  tenorAsDelta,
  tenorInDays,
  tenorName,
  tenorYearFraction,
} from "./tenor.js";
import { DayCountConvention } from "./dayCount.js";
import { UndefinedTenorError } from "./errors.js";
import { attempt } from "./result.js";

const { ACT360, ACT365, ACT364 } = DayCountConvention;

describe("tenorInDays", () => {
  it("fixed day tenors ignore the convention", () => {
    expect(tenorInDays(Tenor.ON, ACT360)).toBe(1);
    expect(tenorInDays(Tenor.TN, ACT365)).toBe(2);
    expect(tenorInDays(Tenor.SN, ACT364)).toBe(3);
    expect(tenorInDays(Tenor._1W, ACT365)).toBe(7);
    expect(tenorInDays(Tenor._2W, ACT360)).toBe(14);
  });

  it("month and year tenors scale with the convention", () => {
    expect(tenorInDays(Tenor._1M, ACT360)).toBe(30);
    expect(tenorInDays(Tenor._3M, ACT364)).toBe(90);
    expect(tenorInDays(Tenor._1Y, ACT365)).toBe(365);
    expect(tenorInDays(Tenor._30Y, ACT360)).toBe(10_800);
  });
});

describe("tenor names", () => {
  it("display names", () => {
    expect(tenorName(Tenor._10Y)).toBe("10Y");
    expect(TENORS.map(tenorName)).toEqual(["ON", "TN", "SN", "1W", "2W", "1M", "3M", "6M", "1Y", "5Y", "10Y", "20Y", "30Y"]);
  });

  it("parses display names and constant keys", () => {
    expect(parseTenor("6m")).toBe(Tenor._6M);
    expect(parseTenor("_5Y")).toBe(Tenor._5Y);
    expect(() => parseTenor("7Y")).toThrow(UndefinedTenorError);
  });
});

describe("tenorAsDelta", () => {
  it("carries only days", () => {
    const d = tenorAsDelta(Tenor._1W, ACT365);
    expect(d.fields().days).toBe(7n);
    expect(d.fields().hours).toBe(0n);
    expect(d.totalSeconds()).toBe(604_800n);
  });
});

describe("tenorYearFraction", () => {
  it("uses real division", () => {
    expect(tenorYearFraction(Tenor._6M, ACT360)).toBe(0.5);
    expect(tenorYearFraction(Tenor._1Y, ACT365)).toBe(1);
    expect(tenorYearFraction(Tenor.ON, ACT360)).toBeCloseTo(1 / 360, 15);
  });
});

describe("tenor outside the enumeration", () => {
  const fourMonths = JSON.parse('"4M"') as Tenor;

  it("every lookup reports UndefinedTenor", () => {
    for (const lookup of [
      () => tenorName(fourMonths),
      () => tenorInDays(fourMonths, ACT365),
      () => tenorAsDelta(fourMonths, ACT365),
      () => tenorYearFraction(fourMonths, ACT360),
    ]) {
      expect(attempt<unknown>(lookup)).toMatchObject({ ok: false, error: { kind: "UndefinedTenor" } });
    }
  });
});
