/**
 * Where the base (unison) of a composition sits on the keyboard.
 */

import { fromHzToCents, type Interval } from "../intonation/interval.js";
import { isMidiNote, midiNoteFrequency, midiNotePitchClass, type MidiNote } from "../intonation/midi-note.js";
import { isPitchClass, pitchClassName, type PitchClass } from "../intonation/pitch-class.js";
import { CONCERT_PITCH_FREQ } from "./defaults.js";
import { InvalidConfigurationError } from "./errors.js";
import { tuningPitch, type TuningPitch } from "./tuning-pitch.js";

interface BaseTuningReference {
  readonly basePitchClass: PitchClass;
  /** Cents away from the 12-EDO pitch of `basePitchClass`. */
  readonly baseDeviation: number;
}

/** Base on a key, optionally detuned by a fixed number of cents. */
export interface StandardTuningReference extends BaseTuningReference {
  readonly type: "standard";
}

/**
 * Base defined relative to a concert pitch: the base sounds
 * `concertPitchToBaseInterval` above `concertPitchFreq` and is played on
 * `baseMidiNote`.
 */
export interface ConcertPitchTuningReference extends BaseTuningReference {
  readonly type: "concertPitch";
  readonly concertPitchToBaseInterval: Interval;
  readonly baseMidiNote: MidiNote;
  readonly concertPitchFreq: number;
}

export type TuningReference = StandardTuningReference | ConcertPitchTuningReference;

export function standardTuningReference(basePitchClass: PitchClass, baseDeviation = 0): StandardTuningReference {
  if (!isPitchClass(basePitchClass)) {
    throw new InvalidConfigurationError(`Invalid base pitch class ${basePitchClass}`);
  }
  if (!Number.isFinite(baseDeviation)) {
    throw new InvalidConfigurationError(`Invalid base deviation ${baseDeviation}`);
  }
  return { type: "standard", basePitchClass, baseDeviation };
}

export function concertPitchTuningReference(
  concertPitchToBaseInterval: Interval,
  baseMidiNote: MidiNote,
  concertPitchFreq: number = CONCERT_PITCH_FREQ,
): ConcertPitchTuningReference {
  if (!isMidiNote(baseMidiNote)) {
    throw new InvalidConfigurationError(`Invalid base MIDI note ${baseMidiNote}`);
  }
  if (!(concertPitchFreq > 0) || !Number.isFinite(concertPitchFreq)) {
    throw new InvalidConfigurationError(`Invalid concert pitch frequency ${concertPitchFreq}`);
  }

  const noteCents = fromHzToCents(midiNoteFrequency(baseMidiNote), concertPitchFreq);
  return {
    type: "concertPitch",
    concertPitchToBaseInterval,
    baseMidiNote,
    concertPitchFreq,
    basePitchClass: midiNotePitchClass(baseMidiNote),
    baseDeviation: concertPitchToBaseInterval.cents - noteCents,
  };
}

export function baseTuningPitch(reference: TuningReference): TuningPitch {
  return tuningPitch(reference.basePitchClass, reference.baseDeviation);
}

export function describeTuningReference(reference: TuningReference): string {
  const base = `${pitchClassName(reference.basePitchClass)} ${reference.baseDeviation >= 0 ? "+" : ""}` +
    `${reference.baseDeviation.toFixed(2)}¢`;
  switch (reference.type) {
    case "standard":
      return `standard, base ${base}`;
    case "concertPitch":
      return `concert pitch ${reference.concertPitchFreq} Hz, base ${base} (MIDI ${reference.baseMidiNote})`;
  }
}
