/**
 * Explicit failure channel over the throwing API.
 * Only kinded domain errors are captured; anything else propagates.
 */

import { isFinMathError, type FinMathError } from "./errors.js";

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = FinMathError> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/** Run fn and return its value, or the kinded error it raised, as a Result. */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (e) {
    if (isFinMathError(e)) return err(e);
    throw e;
  }
}

/** Return the value of an Ok result; rethrow the error of an Err result. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error;
}
