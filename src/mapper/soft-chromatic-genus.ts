/**
 * Soft chromatic genus (soft Hijaz) detection.
 *
 * In a soft Hijaz tetrachord the quarter-tone degrees sit next to an
 * augmented second. Mapping them the "usual" way puts the augmented second
 * on 3 keys; this detector tells the auto mapper when re-rounding a single
 * quarter tone in the other direction gives a 2 + 2 key layout instead.
 */

import { mod } from "../intonation/interval.js";
import type { PitchClass } from "../intonation/pitch-class.js";
import { fuzzyEquals, fuzzyGreaterOrEqual, fuzzyLessOrEqual } from "../tuning/round.js";

export const SOFT_CHROMATIC_GENUS_MAPPINGS = ["off", "strict", "pseudoChromatic"] as const;

export type SoftChromaticGenusMapping = (typeof SOFT_CHROMATIC_GENUS_MAPPINGS)[number];

const SMALL_INTERVAL = 150;
const MAX_AUG2_INTERVAL = 300;

const AUG2_THRESHOLDS: Record<SoftChromaticGenusMapping, number> = {
  off: Number.POSITIVE_INFINITY,
  strict: 210,
  pseudoChromatic: 190,
};

/** Smallest interval, in cents, accepted as the augmented second. */
export function aug2Threshold(mapping: SoftChromaticGenusMapping): number {
  return AUG2_THRESHOLDS[mapping];
}

/** A mapped scale degree: the key it landed on and its interval in cents. */
export interface ScalePitchSample {
  readonly pitchClass: PitchClass;
  readonly cents: number;
}

export interface SoftChromaticGenusOptions {
  mapping: SoftChromaticGenusMapping;
  mapQuarterTonesLow: boolean;
  quarterToneTolerance: number;
  tolerance: number;
}

/**
 * Decide whether `current` should be re-rounded.
 *
 * @returns `"low"` or `"high"` for the new rounding direction, or `undefined`
 * to keep the current mapping.
 */
export function detectSoftChromaticGenus(
  below: ScalePitchSample,
  current: ScalePitchSample,
  above: ScalePitchSample,
  options: SoftChromaticGenusOptions,
): "low" | "high" | undefined {
  if (options.mapping === "off") return undefined;

  const threshold = aug2Threshold(options.mapping);
  const { quarterToneTolerance, tolerance } = options;

  const intervalBelow = current.cents - below.cents;
  const intervalAbove = above.cents - current.cents;
  const keysBelow = mod(current.pitchClass - below.pitchClass, 12);
  const keysAbove = mod(above.pitchClass - current.pitchClass, 12);
  if (keysBelow !== 2 || keysAbove !== 2) return undefined;

  const isAug2 = (interval: number) =>
    fuzzyGreaterOrEqual(interval, threshold, tolerance) &&
    fuzzyLessOrEqual(interval, MAX_AUG2_INTERVAL, tolerance);

  // Second degree: small step below, augmented second above.
  if (
    !options.mapQuarterTonesLow &&
    fuzzyEquals(intervalBelow, SMALL_INTERVAL, quarterToneTolerance) &&
    isAug2(intervalAbove)
  ) {
    return "low";
  }

  // Third degree: augmented second below, small step above.
  if (
    options.mapQuarterTonesLow &&
    isAug2(intervalBelow) &&
    fuzzyEquals(intervalAbove, SMALL_INTERVAL, quarterToneTolerance)
  ) {
    return "high";
  }

  return undefined;
}
