import { CubicSplineInterpolation } from "./cubicSplineInterpolation.js";
import type { CurvePoints, Interpolation, InterpolationKind } from "./interpolation.js";
import { LinearInterpolation } from "./linearInterpolation.js";
import { neverReached } from "./validation.js";

/** Build the evaluator for kind over points. */
export function createInterpolation(kind: InterpolationKind, points: CurvePoints): Interpolation {
  switch (kind) {
    case "linear":
      return new LinearInterpolation(points);
    case "cubicSpline":
      return new CubicSplineInterpolation(points);
    default:
      return neverReached(`Unknown interpolation kind: ${String(kind)}`);
  }
}
