/**
 * Pitch classes of a 12-key-per-octave keyboard: C = 0 … B = 11.
 */

import { mod } from "./interval.js";

export type PitchClass = number;

export const PITCH_CLASS_COUNT = 12;

export const PITCH_CLASS_NAMES: readonly string[] = [
  "C", "C♯/D♭", "D", "D♯/E♭", "E", "F", "F♯/G♭", "G", "G♯/A♭", "A", "A♯/B♭", "B",
];

/** Semitone offset of each natural note letter. */
const NATURALS: Record<string, number> = {
  C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11,
};

const ACCIDENTALS: Record<string, number> = {
  "": 0, "#": 1, "♯": 1, "b": -1, "♭": -1,
};

export function isPitchClass(value: number): value is PitchClass {
  return Number.isInteger(value) && value >= 0 && value < PITCH_CLASS_COUNT;
}

/** Reduce any integer semitone number to its pitch class. */
export function pitchClassOf(semitone: number): PitchClass {
  return mod(semitone, PITCH_CLASS_COUNT);
}

export function pitchClassName(pitchClass: PitchClass): string {
  const name = PITCH_CLASS_NAMES[pitchClassOf(pitchClass)];
  if (name === undefined) {
    throw new RangeError(`Invalid pitch class ${pitchClass}`);
  }
  return name;
}

/**
 * Parse a pitch class from a number ("0".."11"), a canonical name ("C♯/D♭")
 * or a single spelling ("C#", "Db", "E♭", "B♯").
 * Returns `undefined` when the text is not a pitch class.
 */
export function parsePitchClass(text: string): PitchClass | undefined {
  const value = text.trim();

  if (/^\d+$/.test(value)) {
    const n = Number(value);
    return isPitchClass(n) ? n : undefined;
  }

  const canonical = PITCH_CLASS_NAMES.indexOf(value);
  if (canonical >= 0) return canonical;

  const match = /^([A-Ga-g])(#|♯|b|♭)?$/.exec(value);
  if (!match) return undefined;

  const natural = NATURALS[match[1].toUpperCase()];
  const accidental = ACCIDENTALS[match[2] ?? ""];
  if (natural === undefined || accidental === undefined) return undefined;
  return pitchClassOf(natural + accidental);
}
