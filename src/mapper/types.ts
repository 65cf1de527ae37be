/**
 * Mapper contract shared by the automatic and manual mappers.
 */

import type { Interval } from "../intonation/interval.js";
import type { Scale } from "../intonation/scale.js";
import type { PartialTuning } from "../tuning/partial-tuning.js";
import type { TuningReference } from "../tuning/tuning-reference.js";

export type TuningMapperType = "auto" | "manual";

export interface TuningMapper {
  readonly type: TuningMapperType;

  /**
   * Map the scale, transposed by `transposition`, onto the 12 keys.
   * Throws `TuningMapperConflictError`, `TuningMapperOverflowError` or
   * `InvalidConfigurationError` when no tuning can be produced.
   */
  mapScale(scale: Scale, reference: TuningReference, transposition?: Interval): PartialTuning;
}
