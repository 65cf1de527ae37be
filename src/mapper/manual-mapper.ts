/**
 * Manual mapper: puts scale degrees on the keys named by a keyboard mapping,
 * without any rounding.
 */

import { mod, OCTAVE_CENTS, UNISON, type Interval } from "../intonation/interval.js";
import { transposeScale, type Scale } from "../intonation/scale.js";
import { MAX_EXCLUSIVE_DEVIATION, MIN_EXCLUSIVE_DEVIATION, TUNING_SIZE } from "../tuning/defaults.js";
import { InvalidConfigurationError, TuningMapperOverflowError } from "../tuning/errors.js";
import { keyboardMappingEntries, type KeyboardMapping } from "../tuning/keyboard-mapping.js";
import { createPartialTuning, type Deviation, type PartialTuning } from "../tuning/partial-tuning.js";
import { baseTuningPitch, type TuningReference } from "../tuning/tuning-reference.js";
import { tuningPitchCents } from "../tuning/tuning-pitch.js";
import type { TuningMapper } from "./types.js";

export interface ManualTuningMapperOptions {
  minExclusiveDeviation?: number;
  maxExclusiveDeviation?: number;
}

export interface ManualTuningMapper extends TuningMapper {
  readonly type: "manual";
  readonly keyboardMapping: KeyboardMapping;
  readonly minExclusiveDeviation: number;
  readonly maxExclusiveDeviation: number;
}

export function createManualTuningMapper(
  keyboardMapping: KeyboardMapping,
  options: ManualTuningMapperOptions = {},
): ManualTuningMapper {
  const minExclusiveDeviation = options.minExclusiveDeviation ?? MIN_EXCLUSIVE_DEVIATION;
  const maxExclusiveDeviation = options.maxExclusiveDeviation ?? MAX_EXCLUSIVE_DEVIATION;
  if (minExclusiveDeviation >= maxExclusiveDeviation) {
    throw new InvalidConfigurationError(
      `minExclusiveDeviation (${minExclusiveDeviation}) must be less than maxExclusiveDeviation (${maxExclusiveDeviation})`,
    );
  }

  function mapScale(scale: Scale, reference: TuningReference, transposition: Interval = UNISON): PartialTuning {
    const entries = keyboardMappingEntries(keyboardMapping);
    for (const [, index] of entries) {
      if (index >= scale.intervals.length) {
        throw new InvalidConfigurationError(
          `Keyboard mapping references degree ${index} but scale "${scale.name}" has only ` +
            `${scale.intervals.length} degrees`,
        );
      }
    }

    const transposed = transposeScale(scale, transposition);
    const baseCents = tuningPitchCents(baseTuningPitch(reference));
    const deviations = new Array<Deviation>(TUNING_SIZE).fill(undefined);

    for (const [pitchClass, index] of entries) {
      const total = mod(baseCents + transposed.intervals[index].cents, OCTAVE_CENTS);

      // C sits on the octave wrap-around, so it may also be reached from below.
      const deviation = pitchClass === 0
        ? (Math.abs(total) <= Math.abs(total - OCTAVE_CENTS) ? total : total - OCTAVE_CENTS)
        : total - 100 * pitchClass;

      if (deviation <= minExclusiveDeviation || deviation >= maxExclusiveDeviation) {
        throw new TuningMapperOverflowError(pitchClass, deviation, minExclusiveDeviation, maxExclusiveDeviation);
      }
      deviations[pitchClass] = deviation;
    }

    return createPartialTuning(scale.name, deviations);
  }

  return {
    type: "manual",
    keyboardMapping,
    minExclusiveDeviation,
    maxExclusiveDeviation,
    mapScale,
  };
}
