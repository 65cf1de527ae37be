/**
 * Partial tunings: 12 optional deviations, one per pitch class.
 *
 * A missing slot means "no opinion" for that key. Every operation returns a
 * new value; inputs are never mutated.
 */

import { pitchClassName, type PitchClass } from "../intonation/pitch-class.js";
import { logger } from "../utils/log.js";
import { DEFAULT_CENTS_TOLERANCE, TUNING_SIZE } from "./defaults.js";
import { InvalidConfigurationError } from "./errors.js";
import { createOctaveTuning, type OctaveTuning } from "./octave-tuning.js";
import type { TuningPitch } from "./tuning-pitch.js";

export type Deviation = number | undefined;

export interface PartialTuning {
  readonly name: string;
  readonly deviations: readonly Deviation[];
}

export function createPartialTuning(name: string, deviations: readonly Deviation[]): PartialTuning {
  if (deviations.length !== TUNING_SIZE) {
    throw new InvalidConfigurationError(
      `Partial tuning "${name}" needs ${TUNING_SIZE} slots, got ${deviations.length}`,
    );
  }
  return { name, deviations: [...deviations] };
}

export function emptyPartialTuning(name = ""): PartialTuning {
  return createPartialTuning(name, new Array<Deviation>(TUNING_SIZE).fill(undefined));
}

/** 12-EDO: every key present with deviation 0. */
export function standardPartialTuning(name = "Standard"): PartialTuning {
  return createPartialTuning(name, new Array<Deviation>(TUNING_SIZE).fill(0));
}

/**
 * Build a tuning from mapped pitches. When several pitches share a key the
 * first one is kept.
 */
export function partialTuningFromPitches(name: string, pitches: Iterable<TuningPitch>): PartialTuning {
  const deviations = new Array<Deviation>(TUNING_SIZE).fill(undefined);
  for (const { pitchClass, deviation } of pitches) {
    if (deviations[pitchClass] === undefined) {
      deviations[pitchClass] = deviation;
    }
  }
  return createPartialTuning(name, deviations);
}

export function partialTuningFromOctaveTuning(tuning: OctaveTuning): PartialTuning {
  return createPartialTuning(tuning.name, tuning.deviations);
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

export function deviationOf(tuning: PartialTuning, pitchClass: PitchClass): Deviation {
  return tuning.deviations[pitchClass];
}

export function deviationOrZero(tuning: PartialTuning, pitchClass: PitchClass): number {
  return tuning.deviations[pitchClass] ?? 0;
}

export function completedCount(tuning: PartialTuning): number {
  return tuning.deviations.filter((d) => d !== undefined).length;
}

export function isComplete(tuning: PartialTuning): boolean {
  return completedCount(tuning) === TUNING_SIZE;
}

export function isEmptyTuning(tuning: PartialTuning): boolean {
  return completedCount(tuning) === 0;
}

export function unfilledPitchClasses(tuning: PartialTuning): PitchClass[] {
  const result: PitchClass[] = [];
  tuning.deviations.forEach((d, pc) => {
    if (d === undefined) result.push(pc);
  });
  return result;
}

export function renamePartialTuning(tuning: PartialTuning, name: string): PartialTuning {
  return { name, deviations: tuning.deviations };
}

export function partialTuningAlmostEquals(
  a: PartialTuning,
  b: PartialTuning,
  tolerance: number = DEFAULT_CENTS_TOLERANCE,
): boolean {
  return a.name === b.name && a.deviations.every((d, i) => {
    const other = b.deviations[i];
    if (d === undefined || other === undefined) return d === other;
    return Math.abs(d - other) <= tolerance;
  });
}

// ---------------------------------------------------------------------------
// Algebra
// ---------------------------------------------------------------------------

function mergeNames(a: string, b: string): string {
  if (a === "") return b;
  if (b === "") return a;
  return `${a} + ${b}`;
}

/**
 * Combine two tunings slot by slot. Returns `undefined` when any key is
 * present in both with deviations further apart than `tolerance`.
 */
export function mergeTunings(
  a: PartialTuning,
  b: PartialTuning,
  tolerance: number = DEFAULT_CENTS_TOLERANCE,
): PartialTuning | undefined {
  const deviations: Deviation[] = [];

  for (let pc = 0; pc < TUNING_SIZE; pc++) {
    const left = a.deviations[pc];
    const right = b.deviations[pc];

    if (left !== undefined && right !== undefined && Math.abs(left - right) > tolerance) {
      logger.debug(
        `Cannot merge "${a.name}" with "${b.name}": ${pitchClassName(pc)} has ${left} vs ${right}`,
      );
      return undefined;
    }
    deviations.push(left ?? right);
  }

  return createPartialTuning(mergeNames(a.name, b.name), deviations);
}

/** Fill the empty slots of `a` from `b`. Keeps the name of `a`. */
export function fillTuning(a: PartialTuning, b: PartialTuning): PartialTuning {
  return createPartialTuning(a.name, a.deviations.map((d, pc) => d ?? b.deviations[pc]));
}

/** Replace the slots of `a` with those present in `b`. Keeps the name of `a`. */
export function overwriteTuning(a: PartialTuning, b: PartialTuning): PartialTuning {
  return createPartialTuning(a.name, a.deviations.map((d, pc) => b.deviations[pc] ?? d));
}

/** Complete a tuning, treating missing keys as 12-EDO (deviation 0). */
export function resolveTuning(tuning: PartialTuning): OctaveTuning {
  return createOctaveTuning(tuning.name, tuning.deviations.map((_, pc) => deviationOrZero(tuning, pc)));
}
