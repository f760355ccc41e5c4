/**
 * Timestamp precision. Each value is the number of ticks per second,
 * so rescaling between two precisions is a ratio of their values.
 */

import { ValidationError } from "./errors.js";

export const Precision = {
  SECONDS: 1,
  MILLISECONDS: 1_000,
  MICROSECONDS: 1_000_000,
  NANOSECONDS: 1_000_000_000,
} as const;

export type Precision = (typeof Precision)[keyof typeof Precision];

const NAMES: Record<Precision, string> = {
  [Precision.SECONDS]: "SECONDS",
  [Precision.MILLISECONDS]: "MILLISECONDS",
  [Precision.MICROSECONDS]: "MICROSECONDS",
  [Precision.NANOSECONDS]: "NANOSECONDS",
};

export function isPrecision(value: unknown): value is Precision {
  return typeof value === "number" && Object.hasOwn(NAMES, value);
}

/** Ticks per second as bigint. */
export function precisionScale(precision: Precision): bigint {
  if (!isPrecision(precision)) {
    throw new ValidationError(`Unknown precision: ${String(precision)}`, { precision });
  }
  return BigInt(precision);
}

export function precisionName(precision: Precision): string {
  if (!isPrecision(precision)) {
    throw new ValidationError(`Unknown precision: ${String(precision)}`, { precision });
  }
  return NAMES[precision];
}
