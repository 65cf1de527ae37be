/**
 * Logarithmic pitch intervals.
 *
 * An interval is carried by its size in cents. Intervals built from integer
 * ratios also keep the reduced fraction, so ratio arithmetic stays exact and
 * the ratio can be shown back to the user.
 */

import { DEFAULT_CENTS_TOLERANCE } from "../tuning/defaults.js";

export interface Ratio {
  numerator: number;
  denominator: number;
}

export interface Interval {
  /** Size in cents (1200 per octave). */
  readonly cents: number;
  /** Reduced fraction, present only for just (ratio) intervals. */
  readonly ratio?: Ratio;
}

export const OCTAVE_CENTS = 1200;

/** Floored modulo: the result always has the sign of the modulus. */
export function mod(value: number, modulus: number): number {
  if (modulus <= 0) {
    throw new RangeError(`Modulus must be greater than 0, got ${modulus}`);
  }
  const result = value % modulus;
  return result >= 0 ? result : result + modulus;
}

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

export function fromRealValueToCents(realValue: number): number {
  if (!(realValue > 0) || !Number.isFinite(realValue)) {
    throw new RangeError(`Expecting a positive finite real value, got ${realValue}`);
  }
  return OCTAVE_CENTS * Math.log2(realValue);
}

export function fromHzToCents(freqHz: number, baseFreqHz: number): number {
  if (!(freqHz > 0) || !(baseFreqHz > 0)) {
    throw new RangeError(`Expecting positive frequencies, got ${freqHz} Hz and ${baseFreqHz} Hz`);
  }
  return fromRealValueToCents(freqHz / baseFreqHz);
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function centsInterval(cents: number): Interval {
  if (!Number.isFinite(cents)) {
    throw new RangeError(`Expecting a finite number of cents, got ${cents}`);
  }
  return { cents };
}

export function ratioInterval(numerator: number, denominator = 1): Interval {
  if (
    !Number.isInteger(numerator) || !Number.isInteger(denominator) ||
    numerator <= 0 || denominator <= 0
  ) {
    throw new RangeError(
      `Expecting a ratio of positive integers, got ${numerator}/${denominator}`,
    );
  }
  const divisor = gcd(numerator, denominator);
  const ratio = { numerator: numerator / divisor, denominator: denominator / divisor };
  return { cents: fromRealValueToCents(ratio.numerator / ratio.denominator), ratio };
}

/** `count` steps of `edo` equal divisions of the octave. */
export function edoInterval(edo: number, count: number): Interval {
  if (!Number.isInteger(edo) || edo <= 0) {
    throw new RangeError(`Expecting a positive integer EDO, got ${edo}`);
  }
  if (!Number.isInteger(count)) {
    throw new RangeError(`Expecting an integer EDO step count, got ${count}`);
  }
  return centsInterval((count / edo) * OCTAVE_CENTS);
}

export const UNISON: Interval = ratioInterval(1, 1);

// ---------------------------------------------------------------------------
// Arithmetic (log space)
// ---------------------------------------------------------------------------

export function addIntervals(a: Interval, b: Interval): Interval {
  if (a.ratio && b.ratio) {
    return ratioInterval(
      a.ratio.numerator * b.ratio.numerator,
      a.ratio.denominator * b.ratio.denominator,
    );
  }
  return centsInterval(a.cents + b.cents);
}

export function subtractIntervals(a: Interval, b: Interval): Interval {
  if (a.ratio && b.ratio) {
    return ratioInterval(
      a.ratio.numerator * b.ratio.denominator,
      a.ratio.denominator * b.ratio.numerator,
    );
  }
  return centsInterval(a.cents - b.cents);
}

export function isNormalized(interval: Interval): boolean {
  return interval.cents >= 0 && interval.cents < OCTAVE_CENTS;
}

/** Reduce an interval by whole octaves into [0, 1200) cents. */
export function normalizeInterval(interval: Interval): Interval {
  if (isNormalized(interval)) return interval;

  if (interval.ratio) {
    const { numerator, denominator } = interval.ratio;
    const exp = -Math.floor(Math.log2(numerator / denominator));
    return exp > 0
      ? ratioInterval(numerator * 2 ** exp, denominator)
      : ratioInterval(numerator, denominator * 2 ** -exp);
  }

  return centsInterval(mod(interval.cents, OCTAVE_CENTS));
}

export function isUnison(interval: Interval, tolerance: number = DEFAULT_CENTS_TOLERANCE): boolean {
  if (interval.ratio) {
    return interval.ratio.numerator === 1 && interval.ratio.denominator === 1;
  }
  return Math.abs(interval.cents) <= tolerance;
}

// ---------------------------------------------------------------------------
// Text form
// ---------------------------------------------------------------------------

/**
 * Parse an interval from text.
 *
 *   - `"386.31"`, `"-150.0"`: cents (anything with a decimal point)
 *   - `"5/4"`, `"2"`: ratio
 *   - `"4\\72"`: EDO step (`count\edo`)
 */
export function parseInterval(text: string): Interval {
  const value = text.trim();

  const edoMatch = /^(-?\d+)\\(\d+)$/.exec(value);
  if (edoMatch) {
    return edoInterval(Number(edoMatch[2]), Number(edoMatch[1]));
  }

  if (value.includes(".")) {
    const cents = Number(value);
    if (Number.isNaN(cents)) {
      throw new Error(`Invalid interval "${text}". Expected cents like "386.31".`);
    }
    return centsInterval(cents);
  }

  const ratioMatch = /^(\d+)(?:\/(\d+))?$/.exec(value);
  if (ratioMatch) {
    return ratioInterval(Number(ratioMatch[1]), ratioMatch[2] ? Number(ratioMatch[2]) : 1);
  }

  throw new Error(
    `Invalid interval "${text}". Use cents ("386.31"), a ratio ("5/4") or an EDO step ("4\\72").`,
  );
}

export function formatInterval(interval: Interval): string {
  if (interval.ratio) {
    return `${interval.ratio.numerator}/${interval.ratio.denominator}`;
  }
  return `${interval.cents.toFixed(2)}¢`;
}
