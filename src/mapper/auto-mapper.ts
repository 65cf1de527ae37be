/**
 * Auto mapper: assigns every scale degree to the nearest key, resolving
 * quarter-tone collisions by re-rounding in the opposite direction.
 *
 * Degrees named by the override keyboard mapping are left out of the
 * automatic pass and mapped literally by a manual mapper afterwards; the two
 * partial tunings are then merged.
 */

import assert from "node:assert";

import { mod, normalizeInterval, UNISON, type Interval } from "../intonation/interval.js";
import { pitchClassName, pitchClassOf, type PitchClass } from "../intonation/pitch-class.js";
import { indexOfUnison, renameScale, transposeScale, type Scale } from "../intonation/scale.js";
import { DEFAULT_CENTS_TOLERANCE, DEFAULT_QUARTER_TONE_TOLERANCE, TUNING_SIZE } from "../tuning/defaults.js";
import { InvalidConfigurationError, TuningMapperConflictError } from "../tuning/errors.js";
import {
  createKeyboardMapping,
  emptyKeyboardMapping,
  isEmptyKeyboardMapping,
  keyboardMappingEntries,
  mappedIndexes,
  mappedIndexOf,
  updateKeyboardMapping,
  type KeyboardMapping,
} from "../tuning/keyboard-mapping.js";
import {
  emptyPartialTuning,
  mergeTunings,
  partialTuningFromPitches,
  type PartialTuning,
} from "../tuning/partial-tuning.js";
import { roundWithTolerance } from "../tuning/round.js";
import { baseTuningPitch, type TuningReference } from "../tuning/tuning-reference.js";
import {
  isQuarterTone,
  tuningPitch,
  tuningPitchAlmostEquals,
  tuningPitchCents,
  type TuningPitch,
} from "../tuning/tuning-pitch.js";
import { logger } from "../utils/log.js";
import { createManualTuningMapper } from "./manual-mapper.js";
import { detectSoftChromaticGenus, type SoftChromaticGenusMapping } from "./soft-chromatic-genus.js";
import type { TuningMapper } from "./types.js";

export interface AutoTuningMapperOptions {
  /** Round quarter tones down (e.g. 150¢ from C → C♯ +50) instead of up (→ D −50). */
  mapQuarterTonesLow?: boolean;
  /** How far from exactly 50¢, in cents, a deviation still counts as a quarter tone. */
  quarterToneTolerance?: number;
  softChromaticGenusMapping?: SoftChromaticGenusMapping;
  /** Degrees mapped literally onto the given keys instead of automatically. */
  overrideKeyboardMapping?: KeyboardMapping;
  /** Deviations closer than this are considered equal. */
  tolerance?: number;
}

export interface AutoTuningMapper extends TuningMapper {
  readonly type: "auto";
  readonly mapQuarterTonesLow: boolean;
  readonly quarterToneTolerance: number;
  readonly softChromaticGenusMapping: SoftChromaticGenusMapping;
  readonly overrideKeyboardMapping: KeyboardMapping;
  readonly tolerance: number;

  /**
   * Map a single interval, measured from the reference base, to a key.
   * `mapQuarterTonesLow` overrides the mapper's own rounding direction.
   */
  mapInterval(interval: Interval, reference: TuningReference, mapQuarterTonesLow?: boolean): TuningPitch;

  /** The keyboard mapping this mapper would use for the scale. */
  keyboardMappingOf(scale: Scale, reference: TuningReference, transposition?: Interval): KeyboardMapping;
}

/** Mapped pitches keyed by the degree's index in the scale. */
type ScalePitches = Map<number, TuningPitch>;

export function createAutoTuningMapper(options: AutoTuningMapperOptions = {}): AutoTuningMapper {
  const mapQuarterTonesLow = options.mapQuarterTonesLow ?? false;
  const quarterToneTolerance = options.quarterToneTolerance ?? DEFAULT_QUARTER_TONE_TOLERANCE;
  const softChromaticGenusMapping = options.softChromaticGenusMapping ?? "off";
  const overrideKeyboardMapping = options.overrideKeyboardMapping ?? emptyKeyboardMapping();
  const tolerance = options.tolerance ?? DEFAULT_CENTS_TOLERANCE;

  const manuallyMappedIndexes = mappedIndexes(overrideKeyboardMapping);
  const manualMapper = isEmptyKeyboardMapping(overrideKeyboardMapping)
    ? undefined
    : createManualTuningMapper(overrideKeyboardMapping);

  function mapInterval(interval: Interval, reference: TuningReference, low = mapQuarterTonesLow): TuningPitch {
    const totalCents = tuningPitchCents(baseTuningPitch(reference)) + interval.cents;
    const semitones = roundWithTolerance(totalCents / 100, low, quarterToneTolerance / 100);
    return tuningPitch(pitchClassOf(semitones), totalCents - 100 * semitones);
  }

  function isOverridden(pitchClass: PitchClass): boolean {
    return mappedIndexOf(overrideKeyboardMapping, pitchClass) !== undefined;
  }

  /** `scale` is already transposed. */
  function mapScaleToPitches(scale: Scale, reference: TuningReference): ScalePitches {
    const degrees = scale.intervals
      .map((interval, index) => ({ interval: normalizeInterval(interval), index }))
      .sort((a, b) => a.interval.cents - b.interval.cents);
    const count = degrees.length;
    if (count === 0) {
      throw new InvalidConfigurationError(`Scale "${scale.name}" has no degrees to map`);
    }

    // One extra step, wrapped with modulo, also checks the quarter tone
    // between the last and the first degree. A single degree has no neighbour.
    const lastStep = count > 1 ? count : 0;
    const pitches: ScalePitches = new Map();
    let lastPitchClass: PitchClass | undefined;
    for (let step = 0; step <= lastStep; step++) {
      const { interval, index } = degrees[(mapQuarterTonesLow ? step : count - step) % count];
      if (manuallyMappedIndexes.has(index)) continue;

      let pitch = mapInterval(interval, reference);
      if (pitch.pitchClass === lastPitchClass || isOverridden(pitch.pitchClass)) {
        pitch = mapInterval(interval, reference, !mapQuarterTonesLow);
      }

      pitches.set(index, pitch);
      lastPitchClass = pitch.pitchClass;
    }

    const conflicts = findConflicts(pitches);
    if (conflicts.size > 0) {
      throw new TuningMapperConflictError(scale.name, conflicts);
    }

    return applySoftChromaticGenusMapping(pitches, scale, reference);
  }

  function findConflicts(pitches: ScalePitches): Map<PitchClass, TuningPitch[]> {
    const byPitchClass = new Map<PitchClass, TuningPitch[]>();
    for (const pitch of pitches.values()) {
      const group = byPitchClass.get(pitch.pitchClass);
      if (group) group.push(pitch);
      else byPitchClass.set(pitch.pitchClass, [pitch]);
    }

    const conflicts = new Map<PitchClass, TuningPitch[]>();
    for (const [pitchClass, [first, ...rest]] of byPitchClass) {
      if (rest.some((pitch) => !tuningPitchAlmostEquals(pitch, first, tolerance))) {
        conflicts.set(pitchClass, [first, ...rest]);
      }
    }
    return conflicts;
  }

  function applySoftChromaticGenusMapping(
    pitches: ScalePitches,
    scale: Scale,
    reference: TuningReference,
  ): ScalePitches {
    if (softChromaticGenusMapping === "off") return pitches;

    const size = pitches.size;
    const result: ScalePitches = new Map();
    for (const [index, pitch] of pitches) {
      const prevIndex = mod(index - 1, size);
      const nextIndex = mod(index + 1, size);
      const prev = pitches.get(prevIndex);
      const next = pitches.get(nextIndex);

      if (!isQuarterTone(pitch, quarterToneTolerance) || !prev || !next) {
        result.set(index, pitch);
        continue;
      }

      const direction = detectSoftChromaticGenus(
        { pitchClass: prev.pitchClass, cents: scale.intervals[prevIndex].cents },
        { pitchClass: pitch.pitchClass, cents: scale.intervals[index].cents },
        { pitchClass: next.pitchClass, cents: scale.intervals[nextIndex].cents },
        { mapping: softChromaticGenusMapping, mapQuarterTonesLow, quarterToneTolerance, tolerance },
      );
      if (direction) {
        logger.debug(
          `Soft chromatic genus in "${scale.name}": degree ${index} on ${pitchClassName(pitch.pitchClass)} ` +
            `re-rounded ${direction}`,
        );
      }
      result.set(
        index,
        direction ? mapInterval(scale.intervals[index], reference, direction === "low") : pitch,
      );
    }
    return result;
  }

  function tuningNameOf(scale: Scale, pitches: ScalePitches): string {
    const base = pitches.get(indexOfUnison(scale));
    return base ? `${pitchClassName(base.pitchClass)} ${scale.name}` : scale.name;
  }

  function mapScale(scale: Scale, reference: TuningReference, transposition: Interval = UNISON): PartialTuning {
    const transposed = transposeScale(scale, transposition);
    const pitches = mapScaleToPitches(transposed, reference);
    const autoTuning = partialTuningFromPitches(tuningNameOf(scale, pitches), pitches.values());

    // The empty name keeps the merged name equal to the automatic one.
    const manualTuning = manualMapper
      ? manualMapper.mapScale(renameScale(transposed, ""), reference)
      : emptyPartialTuning();

    const merged = mergeTunings(autoTuning, manualTuning, tolerance);
    assert(merged, `Keys of the override keyboard mapping were also mapped automatically for "${scale.name}"`);
    return merged;
  }

  function keyboardMappingOf(
    scale: Scale,
    reference: TuningReference,
    transposition: Interval = UNISON,
  ): KeyboardMapping {
    const pitches = mapScaleToPitches(transposeScale(scale, transposition), reference);

    const indexes = new Array<number | undefined>(TUNING_SIZE).fill(undefined);
    for (const [index, { pitchClass }] of pitches) {
      const current = indexes[pitchClass];
      if (current === undefined || index < current) indexes[pitchClass] = index;
    }
    return keyboardMappingEntries(overrideKeyboardMapping).reduce(
      (mapping, [pitchClass, index]) => updateKeyboardMapping(mapping, pitchClass, index),
      createKeyboardMapping(indexes),
    );
  }

  return {
    type: "auto",
    mapQuarterTonesLow,
    quarterToneTolerance,
    softChromaticGenusMapping,
    overrideKeyboardMapping,
    tolerance,
    mapInterval,
    keyboardMappingOf,
    mapScale,
  };
}
