/**
 * Complete 12-key tunings: the hardware-ready result of mapping and reduction.
 */

import { TUNING_SIZE } from "./defaults.js";
import { InvalidConfigurationError } from "./errors.js";

export interface OctaveTuning {
  readonly name: string;
  /** Deviation in cents for each pitch class, C first. */
  readonly deviations: readonly number[];
}

export type TuningList = readonly OctaveTuning[];

export function createOctaveTuning(name: string, deviations: readonly number[]): OctaveTuning {
  if (deviations.length !== TUNING_SIZE) {
    throw new InvalidConfigurationError(
      `Octave tuning "${name}" needs ${TUNING_SIZE} deviations, got ${deviations.length}`,
    );
  }
  for (const deviation of deviations) {
    if (!Number.isFinite(deviation)) {
      throw new InvalidConfigurationError(`Octave tuning "${name}" has a non-finite deviation`);
    }
  }
  return { name, deviations: [...deviations] };
}
