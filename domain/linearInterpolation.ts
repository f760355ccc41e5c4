/**
 * Piecewise-linear interpolation between adjacent knots.
 */

import { Interpolation } from "./interpolation.js";
import { neverReached } from "./validation.js";

function lerp(x0: number, y0: number, x1: number, y1: number, x: number): number {
  return y0 + ((x - x0) * (y1 - y0)) / (x1 - x0);
}

export class LinearInterpolation extends Interpolation {
  readonly kind = "linear" as const;

  /** First closed segment [x[i-1], x[i]] containing x, scanning left to right. */
  evaluate(x: number): number {
    this.assertInRange(x);
    const xs = this.xValues;
    const ys = this.yValues;
    for (let i = 1; i < xs.length; i++) {
      if (x >= xs[i - 1] && x <= xs[i]) {
        // knots are returned as stored, without rounding through lerp
        if (x === xs[i]) return ys[i];
        return lerp(xs[i - 1], ys[i - 1], xs[i], ys[i], x);
      }
    }
    return neverReached(`No segment contains x=${x}`);
  }
}
