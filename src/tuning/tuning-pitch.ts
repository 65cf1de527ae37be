/**
 * A keyboard key together with its deviation from 12-EDO.
 */

import { pitchClassName, type PitchClass } from "../intonation/pitch-class.js";
import { DEFAULT_CENTS_TOLERANCE } from "./defaults.js";

export interface TuningPitch {
  readonly pitchClass: PitchClass;
  /** Cents away from the key's 12-EDO pitch. */
  readonly deviation: number;
}

export function tuningPitch(pitchClass: PitchClass, deviation: number): TuningPitch {
  return { pitchClass, deviation };
}

export function tuningPitchCents(pitch: TuningPitch): number {
  return 100 * pitch.pitchClass + pitch.deviation;
}

export function isOverflowing(pitch: TuningPitch): boolean {
  return Math.abs(pitch.deviation) >= 100;
}

export function isQuarterTone(pitch: TuningPitch, tolerance: number): boolean {
  return Math.abs(Math.abs(pitch.deviation) - 50) <= tolerance;
}

export function tuningPitchAlmostEquals(
  a: TuningPitch,
  b: TuningPitch,
  tolerance: number = DEFAULT_CENTS_TOLERANCE,
): boolean {
  return a.pitchClass === b.pitchClass && Math.abs(a.deviation - b.deviation) <= tolerance;
}

export function formatTuningPitch(pitch: TuningPitch): string {
  const sign = pitch.deviation >= 0 ? "+" : "";
  return `${pitchClassName(pitch.pitchClass)} ${sign}${pitch.deviation.toFixed(2)}`;
}
