/**
 * Domain validation — assertions, invariants and numeric coercions.
 * Framework-independent. No numerical logic.
 */

import { InvariantViolation, ValidationError, type ErrorMetadata } from "./errors.js";

/** Throws ValidationError if condition is falsy. TypeScript narrows after a successful call. */
export function assert(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new ValidationError(message, metadata);
  }
}

/** Same as assert but raises InvariantViolation; use for invariants that must always hold. */
export function invariant(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message, metadata);
  }
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(message = "Unreachable"): never {
  throw new InvariantViolation(message);
}

/** Integer input accepted where a bigint is stored. */
export type IntegerLike = number | bigint;

/** Coerce an integer number or bigint to bigint. Rejects fractions, NaN and infinities. */
export function toBigInt(value: IntegerLike, field: string): bigint {
  if (typeof value === "bigint") return value;
  assert(Number.isSafeInteger(value), `${field} must be a safe integer, got ${value}`, { field, value });
  return BigInt(value);
}

/** Rejects NaN and infinities. */
export function assertFinite(value: number, field: string): void {
  assert(Number.isFinite(value), `${field} must be a finite number, got ${value}`, { field, value });
}
