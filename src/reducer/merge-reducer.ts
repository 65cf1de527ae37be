/**
 * Merge reducer: collapses consecutive compatible tunings into one and fills
 * the gaps of each result from its neighbours, so that switching from one
 * tuning to the next retunes as few keys as possible.
 */

import { DEFAULT_CENTS_TOLERANCE } from "../tuning/defaults.js";
import {
  fillTuning,
  mergeTunings,
  standardPartialTuning,
  type PartialTuning,
} from "../tuning/partial-tuning.js";
import { logger } from "../utils/log.js";
import { completeTuning } from "./complete.js";
import type { TuningReducer } from "./types.js";

export interface MergeTuningReducerOptions {
  /** Deviations closer than this are merged as equal. */
  equalityTolerance?: number;
}

export interface MergeTuningReducer extends TuningReducer {
  readonly type: "merge";
  readonly equalityTolerance: number;
}

export function createMergeTuningReducer(options: MergeTuningReducerOptions = {}): MergeTuningReducer {
  const equalityTolerance = options.equalityTolerance ?? DEFAULT_CENTS_TOLERANCE;

  /** Greedy left-to-right grouping: a conflict closes the current group. */
  function mergeConsecutive(partials: readonly PartialTuning[]): PartialTuning[] {
    const groups: PartialTuning[] = [];
    let current: PartialTuning | undefined;

    for (const tuning of partials) {
      if (current === undefined) {
        current = tuning;
        continue;
      }
      const merged = mergeTunings(current, tuning, equalityTolerance);
      if (merged) {
        current = merged;
      } else {
        groups.push(current);
        current = tuning;
      }
    }
    if (current !== undefined) groups.push(current);

    return groups;
  }

  return {
    type: "merge",
    equalityTolerance,
    reduceTunings(partials, globalFill: PartialTuning = standardPartialTuning()) {
      if (partials.length === 0) return [];

      const merged = mergeConsecutive(partials);
      logger.debug(`Merged ${partials.length} tunings into ${merged.length}`);

      // Back-fill: each tuning takes what is still missing from everything before it.
      const backFilled: PartialTuning[] = [];
      for (const [i, tuning] of merged.entries()) {
        backFilled.push(i === 0 ? tuning : fillTuning(tuning, backFilled[i - 1]));
      }

      // Fore-fill: then from everything after it.
      const foreFilled: PartialTuning[] = [...backFilled];
      for (let i = foreFilled.length - 2; i >= 0; i--) {
        foreFilled[i] = fillTuning(foreFilled[i], foreFilled[i + 1]);
      }

      return foreFilled.map((tuning) => completeTuning(tuning, globalFill));
    },
  };
}
