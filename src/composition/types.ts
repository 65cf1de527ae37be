/**
 * Compositions: ordered scale-based tuning requests plus everything needed
 * to turn them into a tuning list.
 */

import type { Interval } from "../intonation/interval.js";
import type { Scale } from "../intonation/scale.js";
import type { TuningMapper } from "../mapper/types.js";
import type { TuningReducer } from "../reducer/types.js";
import type { PartialTuning } from "../tuning/partial-tuning.js";
import type { TuningReference } from "../tuning/tuning-reference.js";

/** One scale, transposed from the composition base, and the mapper that puts it on the keys. */
export interface TuningSpec {
  readonly transposition: Interval;
  readonly scale: Scale;
  readonly tuningMapper: TuningMapper;
}

export interface FillSpec {
  /** Tuning used for keys that no tuning of the composition defines. */
  readonly global?: TuningSpec;
}

export interface CompositionMetadata {
  readonly name?: string;
  readonly composerName?: string;
  readonly author?: string;
}

export interface Composition {
  readonly tuningReference: TuningReference;
  readonly tuningSpecs: readonly TuningSpec[];
  readonly tuningReducer: TuningReducer;
  readonly fill: FillSpec;
  readonly metadata?: CompositionMetadata;
}

export function tuningFor(spec: TuningSpec, reference: TuningReference): PartialTuning {
  return spec.tuningMapper.mapScale(spec.scale, reference, spec.transposition);
}
