/**
 * Coercion of validated tool input into engine values.
 *
 * Zod checks the shape; these functions check what only the domain knows
 * (note names, interval syntax, mapping indexes) and build the values.
 */

import { centsInterval, parseInterval, type Interval } from "../intonation/interval.js";
import { MAX_MIDI_NOTE, isMidiNote, parseMidiNote, type MidiNote } from "../intonation/midi-note.js";
import { PITCH_CLASS_NAMES, isPitchClass, parsePitchClass, type PitchClass } from "../intonation/pitch-class.js";
import { createScale, type Scale } from "../intonation/scale.js";
import { createAutoTuningMapper, type AutoTuningMapper } from "../mapper/auto-mapper.js";
import { createManualTuningMapper, type ManualTuningMapper } from "../mapper/manual-mapper.js";
import type { TuningSpec } from "../composition/types.js";
import { keyboardMappingFromEntries, type KeyboardMapping } from "../tuning/keyboard-mapping.js";
import {
  concertPitchTuningReference,
  standardTuningReference,
  type TuningReference,
} from "../tuning/tuning-reference.js";
import type {
  IntervalInput,
  KeyboardMappingInput,
  ScaleInput,
  TuningMapperInput,
  TuningReferenceInput,
  TuningSpecInput,
} from "../schemas/tuning.js";

const VALID_PITCH_CLASSES = `0-11, ${PITCH_CLASS_NAMES.join(", ")}, or spellings like C#, Db, E♭`;

export function toInterval(input: IntervalInput): Interval {
  return typeof input === "number" ? centsInterval(input) : parseInterval(input);
}

export function toScale(input: ScaleInput): Scale {
  return createScale(input.name, input.intervals.map(toInterval));
}

export function toPitchClass(input: string | number): PitchClass {
  const pitchClass = typeof input === "number"
    ? (isPitchClass(input) ? input : undefined)
    : parsePitchClass(input);
  if (pitchClass === undefined) {
    throw new Error(`Invalid pitch class "${input}". Valid: ${VALID_PITCH_CLASSES}`);
  }
  return pitchClass;
}

export function toMidiNote(input: string | number): MidiNote {
  const note = typeof input === "number" ? (isMidiNote(input) ? input : undefined) : parseMidiNote(input);
  if (note === undefined) {
    throw new Error(
      `Invalid MIDI note "${input}". Valid: 0-${MAX_MIDI_NOTE} or a note name with octave like C4, F#3, Bb5`,
    );
  }
  return note;
}

export function toKeyboardMapping(input: KeyboardMappingInput): KeyboardMapping {
  return keyboardMappingFromEntries(
    Object.entries(input).map(([key, index]) => [toPitchClass(key), index] as const),
  );
}

export function toTuningReference(input: TuningReferenceInput): TuningReference {
  switch (input.type) {
    case "standard":
      return standardTuningReference(toPitchClass(input.basePitchClass), input.baseDeviation);
    case "concertPitch":
      return concertPitchTuningReference(
        toInterval(input.concertPitchToBaseInterval),
        toMidiNote(input.baseMidiNote),
        input.concertPitchFreq,
      );
  }
}

export function toTuningMapper(input: TuningMapperInput): AutoTuningMapper | ManualTuningMapper {
  switch (input.type) {
    case "auto":
      return createAutoTuningMapper({
        mapQuarterTonesLow: input.mapQuarterTonesLow,
        quarterToneTolerance: input.quarterToneTolerance,
        softChromaticGenusMapping: input.softChromaticGenusMapping,
        overrideKeyboardMapping: input.overrideKeyboardMapping
          ? toKeyboardMapping(input.overrideKeyboardMapping)
          : undefined,
        tolerance: input.tolerance,
      });
    case "manual":
      return createManualTuningMapper(toKeyboardMapping(input.keyboardMapping), {
        minExclusiveDeviation: input.minExclusiveDeviation,
        maxExclusiveDeviation: input.maxExclusiveDeviation,
      });
  }
}

export function toTuningSpec(input: TuningSpecInput): TuningSpec {
  return {
    scale: toScale(input.scale),
    transposition: toInterval(input.transposition),
    tuningMapper: toTuningMapper(input.mapper),
  };
}
