/**
 * Rounding and tolerant comparison of cents values.
 */

import { DEFAULT_CENTS_TOLERANCE } from "./defaults.js";

/**
 * Round to the nearest integer, except that values whose fractional part is
 * within `halfTolerance` of one half go to the floor when `halfDown` is set
 * and to the ceiling otherwise.
 */
export function roundWithTolerance(value: number, halfDown: boolean, halfTolerance: number): number {
  const floor = Math.floor(value);
  const frac = value - floor;

  if (frac >= 0.5 - halfTolerance && frac <= 0.5 + halfTolerance) {
    return halfDown ? floor : floor + 1;
  }
  return Math.round(value);
}

export function fuzzyEquals(a: number, b: number, tolerance: number = DEFAULT_CENTS_TOLERANCE): boolean {
  return Math.abs(a - b) <= tolerance;
}

/** `a >= b`, treating values within `tolerance` as equal. */
export function fuzzyGreaterOrEqual(a: number, b: number, tolerance: number = DEFAULT_CENTS_TOLERANCE): boolean {
  return a > b || fuzzyEquals(a, b, tolerance);
}

/** `a <= b`, treating values within `tolerance` as equal. */
export function fuzzyLessOrEqual(a: number, b: number, tolerance: number = DEFAULT_CENTS_TOLERANCE): boolean {
  return a < b || fuzzyEquals(a, b, tolerance);
}
