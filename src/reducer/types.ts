/**
 * Reducer contract: turns the partial tunings of a composition into the
 * final tuning list.
 */

import type { OctaveTuning } from "../tuning/octave-tuning.js";
import type { PartialTuning } from "../tuning/partial-tuning.js";

export type TuningReducerType = "direct" | "merge";

export interface TuningReducer {
  readonly type: TuningReducerType;

  /**
   * Reduce `partials` in order. Keys left empty after reduction are taken
   * from `globalFill` (12-EDO by default), then from 12-EDO.
   */
  reduceTunings(partials: readonly PartialTuning[], globalFill?: PartialTuning): OctaveTuning[];
}
