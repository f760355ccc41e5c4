/**
 * Natural cubic spline: C² piecewise cubic with zero second derivative at
 * both end knots. Coefficients are solved once at construction.
 *
 * Segment i evaluates a[i] + b[i]·dx + c[i]·dx² + d[i]·dx³ with dx = x - x[i].
 */

import { Interpolation, type CurvePoints } from "./interpolation.js";

export interface SplineSegment {
  readonly x: number;
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
}

interface SplineCoefficients {
  readonly a: readonly number[];
  readonly b: readonly number[];
  readonly c: readonly number[];
  readonly d: readonly number[];
}

/** Tridiagonal solve (forward elimination, back substitution) for the natural spline. */
function solveNaturalSpline(x: readonly number[], y: readonly number[]): SplineCoefficients {
  const n = x.length - 1; // segments

  const h = new Array<number>(n);
  for (let i = 0; i < n; i++) h[i] = x[i + 1] - x[i];

  const alpha = new Array<number>(n).fill(0);
  for (let i = 1; i < n; i++) {
    alpha[i] = (3 / h[i]) * (y[i + 1] - y[i]) - (3 / h[i - 1]) * (y[i] - y[i - 1]);
  }

  const l = new Array<number>(n + 1).fill(0);
  const mu = new Array<number>(n + 1).fill(0);
  const z = new Array<number>(n + 1).fill(0);
  l[0] = 1;
  for (let i = 1; i < n; i++) {
    l[i] = 2 * (x[i + 1] - x[i - 1]) - h[i - 1] * mu[i - 1];
    mu[i] = h[i] / l[i];
    z[i] = (alpha[i] - h[i - 1] * z[i - 1]) / l[i];
  }
  l[n] = 1;
  z[n] = 0;

  const c = new Array<number>(n + 1).fill(0);
  const b = new Array<number>(n).fill(0);
  const d = new Array<number>(n).fill(0);
  for (let j = n - 1; j >= 0; j--) {
    c[j] = z[j] - mu[j] * c[j + 1];
    b[j] = (y[j + 1] - y[j]) / h[j] - (h[j] * (c[j + 1] + 2 * c[j])) / 3;
    d[j] = (c[j + 1] - c[j]) / (3 * h[j]);
  }

  return { a: y.slice(0, n), b, c: c.slice(0, n), d };
}

export class CubicSplineInterpolation extends Interpolation {
  readonly kind = "cubicSpline" as const;

  private readonly coeffs: SplineCoefficients;

  constructor(points: CurvePoints) {
    super(points);
    this.coeffs = solveNaturalSpline(this.xValues, this.yValues);
  }

  /** Per-segment polynomial coefficients, left to right. */
  segments(): SplineSegment[] {
    const { a, b, c, d } = this.coeffs;
    return a.map((ai, i) => ({ x: this.xValues[i], a: ai, b: b[i], c: c[i], d: d[i] }));
  }

  evaluate(x: number): number {
    this.assertInRange(x);
    const xs = this.xValues;
    if (x === this.xMax) return this.yValues[xs.length - 1];

    // first knot strictly right of x; x < xMax guarantees one exists
    let i = 0;
    for (let j = 1; j < xs.length; j++) {
      if (x < xs[j]) {
        i = j - 1;
        break;
      }
    }
    const { a, b, c, d } = this.coeffs;
    const dx = x - xs[i];
    return a[i] + b[i] * dx + c[i] * dx * dx + d[i] * dx * dx * dx;
  }
}
