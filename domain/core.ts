/**
 * Domain core — structural primitives only.
 * Framework-independent. No calendar or curve assumptions.
 */

import { invariant } from "./validation.js";

// --- Branded scalars (safer than plain numbers) ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Elapsed time as a fraction of a convention-defined year. */
export type YearFraction = Brand<number, "YearFraction">;

// --- Constructors (no validation) ---

export const asYearFraction = (n: number) => n as YearFraction;

// --- Integer arithmetic ---

export const SECONDS_PER_MINUTE = 60n;
export const SECONDS_PER_HOUR = 3_600n;
export const SECONDS_PER_DAY = 86_400n;

/** Integer division rounding half away from zero, like C's round(n / d). */
export function roundDiv(numerator: bigint, denominator: bigint): bigint {
  invariant(denominator !== 0n, "Division by zero");
  const negative = numerator < 0n !== denominator < 0n;
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;
  const q = (2n * n + d) / (2n * d);
  return negative ? -q : q;
}

/** Round half away from zero (Math.round rounds -2.5 to -2). */
export function roundHalfAwayFromZero(x: number): number {
  return x < 0 ? -Math.round(-x) : Math.round(x);
}
