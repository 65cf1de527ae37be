/**
 * Direct reducer: one output tuning per input, no merging.
 */

import { standardPartialTuning, type PartialTuning } from "../tuning/partial-tuning.js";
import { completeTuning } from "./complete.js";
import type { TuningReducer } from "./types.js";

export interface DirectTuningReducer extends TuningReducer {
  readonly type: "direct";
}

export function createDirectTuningReducer(): DirectTuningReducer {
  return {
    type: "direct",
    reduceTunings(partials, globalFill: PartialTuning = standardPartialTuning()) {
      return partials.map((tuning) => completeTuning(tuning, globalFill));
    },
  };
}
