/**
 * Domain error model — base and concrete error types.
 * Framework-independent. No numerical logic.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Closed set of failure kinds raised by the temporal and interpolation engines. */
export type FinMathErrorKind =
  | "NegativeTimestamp"
  | "UndefinedDayCountConvention"
  | "UndefinedTenor"
  | "NonPositiveYearFraction"
  | "MinimalSizeViolation"
  | "NonIncreasingAxis"
  | "OutOfRange";

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a value or input fails validation. */
export class ValidationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when an invariant is violated. */
export class InvariantViolation extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Common shape of every error carrying a {@link FinMathErrorKind}. */
export interface FinMathError extends DomainError {
  readonly kind: FinMathErrorKind;
}

// --- Temporal engine ---

export class NegativeTimestampError extends ValidationError implements FinMathError {
  readonly kind = "NegativeTimestamp" as const;

  constructor(ticks: bigint) {
    super("A timestamp value cannot be negative.", { ticks: ticks.toString() });
  }
}

export class UndefinedDayCountConventionError extends ValidationError implements FinMathError {
  readonly kind = "UndefinedDayCountConvention" as const;

  constructor(value: unknown) {
    super(`Undefined day count convention: ${String(value)}`, { value });
  }
}

export class UndefinedTenorError extends ValidationError implements FinMathError {
  readonly kind = "UndefinedTenor" as const;

  constructor(value: unknown) {
    super(`Undefined tenor: ${String(value)}`, { value });
  }
}

/** Raised when the end of an interval precedes its start. Zero is accepted. */
export class NonPositiveYearFractionError extends InvariantViolation implements FinMathError {
  readonly kind = "NonPositiveYearFraction" as const;

  constructor(fraction: number) {
    super("A year fraction has to be positive.", { fraction });
  }
}

// --- Interpolation engine ---

export class MinimalSizeViolationError extends ValidationError implements FinMathError {
  readonly kind = "MinimalSizeViolation" as const;

  constructor(size: number) {
    super(`At least 2 points are required to interpolate, got ${size}`, { size });
  }
}

export class NonIncreasingAxisError extends ValidationError implements FinMathError {
  readonly kind = "NonIncreasingAxis" as const;

  constructor(index: number, previous: number, current: number) {
    super(`The x-axis must be strictly increasing (x[${index - 1}]=${previous}, x[${index}]=${current})`, {
      index,
      previous,
      current,
    });
  }
}

export class OutOfRangeError extends ValidationError implements FinMathError {
  readonly kind = "OutOfRange" as const;

  constructor(x: number, xMin: number, xMax: number) {
    super(`Cannot interpolate x=${x} outside [${xMin}, ${xMax}]`, { x, xMin, xMax });
  }
}

const KINDS: ReadonlySet<string> = new Set<FinMathErrorKind>([
  "NegativeTimestamp",
  "UndefinedDayCountConvention",
  "UndefinedTenor",
  "NonPositiveYearFraction",
  "MinimalSizeViolation",
  "NonIncreasingAxis",
  "OutOfRange",
]);

/** Narrow an unknown thrown value to a kinded error, optionally of one kind. */
export function isFinMathError(err: unknown, kind?: FinMathErrorKind): err is FinMathError {
  if (!(err instanceof DomainError)) return false;
  if (!("kind" in err) || typeof err.kind !== "string" || !KINDS.has(err.kind)) return false;
  return kind === undefined || err.kind === kind;
}
