/**
 * Interpolation base — validated, strictly increasing (x, y) axis.
 * Concrete evaluators supply evaluate(); the axis never changes after construction.
 */

import { MinimalSizeViolationError, NonIncreasingAxisError, OutOfRangeError } from "./errors.js";
import { assertFinite } from "./validation.js";

/** Closed set of interpolation kinds. */
export type InterpolationKind = "linear" | "cubicSpline";

export type CurvePoint = readonly [x: number, y: number] | { readonly x: number; readonly y: number };

/** Points in iteration order. A Map<number, number> qualifies. */
export type CurvePoints = Iterable<CurvePoint>;

export abstract class Interpolation {
  abstract readonly kind: InterpolationKind;

  readonly xValues: readonly number[];
  readonly yValues: readonly number[];
  readonly xMin: number;
  readonly xMax: number;

  constructor(points: CurvePoints) {
    const xs: number[] = [];
    const ys: number[] = [];
    for (const p of points) {
      const [x, y] = "x" in p ? [p.x, p.y] : p;
      assertFinite(x, `x[${xs.length}]`);
      assertFinite(y, `y[${ys.length}]`);
      xs.push(x);
      ys.push(y);
    }

    if (xs.length < 2) throw new MinimalSizeViolationError(xs.length);
    for (let i = 1; i < xs.length; i++) {
      if (xs[i] <= xs[i - 1]) throw new NonIncreasingAxisError(i, xs[i - 1], xs[i]);
    }

    this.xValues = Object.freeze(xs);
    this.yValues = Object.freeze(ys);
    this.xMin = xs[0];
    this.xMax = xs[xs.length - 1];
  }

  /** Interpolated y at x. OutOfRangeError outside [xMin, xMax]. */
  abstract evaluate(x: number): number;

  evaluateMany(xs: Iterable<number>): number[] {
    return Array.from(xs, (x) => this.evaluate(x));
  }

  /** NaN fails both comparisons and is rejected too. */
  protected assertInRange(x: number): void {
    if (!(x >= this.xMin && x <= this.xMax)) throw new OutOfRangeError(x, this.xMin, this.xMax);
  }
}
