export * from "./errors.js";
export * from "./result.js";
export * from "./core.js";
export { assert, invariant, neverReached, type IntegerLike } from "./validation.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./precision.js";
export * from "./timeDelta.js";
export * from "./epochTimestamp.js";
export * from "./dayCount.js";
export * from "./tenor.js";
export * from "./calendar.js";
export * from "./interpolation.js";
export * from "./linearInterpolation.js";
export * from "./cubicSplineInterpolation.js";
export * from "./interpolationFactory.js";
export * from "./zeroCouponSchedule.js";
