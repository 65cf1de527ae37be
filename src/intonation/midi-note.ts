/**
 * MIDI note numbers (0..127) and their 12-EDO frequencies.
 */

import { CONCERT_PITCH_FREQ, CONCERT_PITCH_MIDI_NOTE } from "../tuning/defaults.js";
import { PITCH_CLASS_COUNT, pitchClassOf, parsePitchClass, type PitchClass } from "./pitch-class.js";

export type MidiNote = number;

export const MIN_MIDI_NOTE = 0;
export const MAX_MIDI_NOTE = 127;

export function isMidiNote(value: number): value is MidiNote {
  return Number.isInteger(value) && value >= MIN_MIDI_NOTE && value <= MAX_MIDI_NOTE;
}

export function midiNotePitchClass(note: MidiNote): PitchClass {
  return pitchClassOf(note);
}

export function midiNoteOf(pitchClass: PitchClass, octave: number): MidiNote {
  return (octave + 1) * PITCH_CLASS_COUNT + pitchClass;
}

/** Frequency in 12-EDO relative to A4 = `concertPitchFreq`. */
export function midiNoteFrequency(
  note: MidiNote,
  concertPitchFreq: number = CONCERT_PITCH_FREQ,
): number {
  return concertPitchFreq * Math.pow(2, (note - CONCERT_PITCH_MIDI_NOTE) / PITCH_CLASS_COUNT);
}

/**
 * Parse a MIDI note from its number ("72") or a note name with octave
 * ("C5", "A4", "F#3", "Bb-1").
 */
export function parseMidiNote(text: string): MidiNote | undefined {
  const value = text.trim();

  if (/^\d+$/.test(value)) {
    const n = Number(value);
    return isMidiNote(n) ? n : undefined;
  }

  const match = /^([A-Ga-g](?:#|♯|b|♭)?)(-?\d+)$/.exec(value);
  if (!match) return undefined;

  const pitchClass = parsePitchClass(match[1]);
  if (pitchClass === undefined) return undefined;

  const note = midiNoteOf(pitchClass, Number(match[2]));
  return isMidiNote(note) ? note : undefined;
}
