/**
 * Errors raised by the tuning engine. They are never caught inside the
 * engine; the MCP layer turns them into error results.
 */

import { pitchClassName, type PitchClass } from "../intonation/pitch-class.js";
import { formatTuningPitch, type TuningPitch } from "./tuning-pitch.js";

export type TuningConflicts = ReadonlyMap<PitchClass, readonly TuningPitch[]>;

/** Two or more scale degrees land on the same key with different deviations. */
export class TuningMapperConflictError extends Error {
  readonly scaleName: string;
  readonly conflicts: TuningConflicts;

  constructor(scaleName: string, conflicts: TuningConflicts) {
    const detail = [...conflicts.entries()]
      .map(([pc, pitches]) =>
        `${pitchClassName(pc)}: [${pitches.map(formatTuningPitch).join(", ")}]`)
      .join("; ");
    super(`Cannot map scale "${scaleName}" to the keyboard, conflicting keys: ${detail}`);
    this.name = "TuningMapperConflictError";
    this.scaleName = scaleName;
    this.conflicts = conflicts;
  }
}

/** A manually mapped deviation falls outside the allowed window around its key. */
export class TuningMapperOverflowError extends Error {
  readonly pitchClass: PitchClass;
  readonly deviation: number;
  readonly minExclusiveDeviation: number;
  readonly maxExclusiveDeviation: number;

  constructor(
    pitchClass: PitchClass,
    deviation: number,
    minExclusiveDeviation: number,
    maxExclusiveDeviation: number,
  ) {
    super(
      `Deviation ${deviation.toFixed(2)} for ${pitchClassName(pitchClass)} is outside ` +
        `(${minExclusiveDeviation}, ${maxExclusiveDeviation})`,
    );
    this.name = "TuningMapperOverflowError";
    this.pitchClass = pitchClass;
    this.deviation = deviation;
    this.minExclusiveDeviation = minExclusiveDeviation;
    this.maxExclusiveDeviation = maxExclusiveDeviation;
  }
}

export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}
