import type { OctaveTuning } from "../tuning/octave-tuning.js";
import { standardPartialTuning } from "../tuning/partial-tuning.js";
import { logger } from "../utils/log.js";
import { tuningFor, type Composition } from "./types.js";

/**
 * Map every tuning spec of the composition and reduce the results.
 * Mapper errors propagate unchanged.
 */
export function tuningListFromComposition(composition: Composition): OctaveTuning[] {
  const { tuningReference, tuningSpecs, tuningReducer, fill } = composition;

  const partials = tuningSpecs.map((spec) => tuningFor(spec, tuningReference));
  const globalFill = fill.global ? tuningFor(fill.global, tuningReference) : standardPartialTuning();

  const tunings = tuningReducer.reduceTunings(partials, globalFill);
  logger.debug(
    `Composition ${composition.metadata?.name ?? "(untitled)"}: ${partials.length} tunings ` +
      `reduced to ${tunings.length} with the ${tuningReducer.type} reducer`,
  );
  return tunings;
}
