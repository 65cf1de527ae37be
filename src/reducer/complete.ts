import { pitchClassName } from "../intonation/pitch-class.js";
import type { OctaveTuning } from "../tuning/octave-tuning.js";
import {
  fillTuning,
  isComplete,
  resolveTuning,
  unfilledPitchClasses,
  type PartialTuning,
} from "../tuning/partial-tuning.js";
import { logger } from "../utils/log.js";

/** Fill from the global tuning and resolve; whatever is still missing becomes 12-EDO. */
export function completeTuning(tuning: PartialTuning, globalFill: PartialTuning): OctaveTuning {
  const filled = fillTuning(tuning, globalFill);
  if (!isComplete(filled)) {
    const missing = unfilledPitchClasses(filled).map(pitchClassName).join(", ");
    logger.info(`Incomplete tuning "${filled.name}", using 12-EDO for: ${missing}`);
  }
  return resolveTuning(filled);
}
