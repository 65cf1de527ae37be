/**
 * Named, ordered sequences of intervals.
 */

import {
  addIntervals,
  centsInterval,
  isUnison,
  ratioInterval,
  type Interval,
} from "./interval.js";

export interface Scale {
  readonly name: string;
  readonly intervals: readonly Interval[];
}

export function createScale(name: string, intervals: readonly Interval[]): Scale {
  if (intervals.length === 0) {
    throw new Error(`Scale "${name}" must have at least one interval`);
  }
  return { name, intervals: [...intervals] };
}

export function centsScale(name: string, cents: readonly number[]): Scale {
  return createScale(name, cents.map(centsInterval));
}

export function ratiosScale(name: string, ratios: readonly (readonly [number, number])[]): Scale {
  return createScale(name, ratios.map(([n, d]) => ratioInterval(n, d)));
}


export function transposeScale(scale: Scale, by: Interval): Scale {
  return { name: scale.name, intervals: scale.intervals.map((i) => addIntervals(i, by)) };
}

export function renameScale(scale: Scale, name: string): Scale {
  return { name, intervals: scale.intervals };
}

/** Index of the first unison degree, or -1. */
export function indexOfUnison(scale: Scale): number {
  return scale.intervals.findIndex((interval) => isUnison(interval));
}
