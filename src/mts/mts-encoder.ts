/**
 * MIDI Tuning Standard (MTS) scale/octave tuning encoder.
 *
 * Encodes an octave tuning as a universal SysEx message:
 *   - Header: F0, 7E (non-real-time) or 7F (real-time), device 7F (all),
 *     08 (MIDI tuning), form 08 (1-byte) or 09 (2-byte)
 *   - Channel mask: 03 7F 7F (all 16 channels)
 *   - 12 tuning values, C first
 *   - Footer: F7
 *
 * Deviations outside the representable range are clamped, never rejected.
 */

import type { OctaveTuning } from "../tuning/octave-tuning.js";

export interface MtsEncodeOptions {
  /** Real-time (7F) instead of non-real-time (7E) universal SysEx. */
  realTime?: boolean;
  /** 2-byte form: 14-bit values, ±100 cents in 8192 steps. */
  twoByte?: boolean;
}

const SYSEX_START = 0xf0;
const SYSEX_END = 0xf7;
const NON_REAL_TIME = 0x7e;
const REAL_TIME = 0x7f;
const ALL_DEVICES = 0x7f;
const MIDI_TUNING = 0x08;
const FORM_1_BYTE = 0x08;
const FORM_2_BYTE = 0x09;
const ALL_CHANNELS = [0x03, 0x7f, 0x7f];

const MIN_1_BYTE = -64;
const MAX_1_BYTE = 63;
const MIN_2_BYTE = -8192;
const MAX_2_BYTE = 8191;

export const MTS_1_BYTE_LENGTH = 21;
export const MTS_2_BYTE_LENGTH = 33;

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** One byte: whole cents in [-64, 63], offset so -64 is 0. */
function encode1ByteValue(deviation: number): number[] {
  return [clamp(Math.round(deviation), MIN_1_BYTE, MAX_1_BYTE) - MIN_1_BYTE];
}

/** Two 7-bit bytes, MSB first: 100 cents span 8192 steps, offset so -8192 is 0. */
function encode2ByteValue(deviation: number): number[] {
  const scaled = clamp(Math.round((-MIN_2_BYTE / 100) * deviation), MIN_2_BYTE, MAX_2_BYTE);
  const value = scaled - MIN_2_BYTE;
  return [value >> 7, value & 0x7f];
}

/**
 * Encode an octave tuning as an MTS scale/octave tuning SysEx message.
 *
 * @returns 21 bytes in the 1-byte form, 33 in the 2-byte form
 */
export function encodeMtsOctaveTuning(tuning: OctaveTuning, options: MtsEncodeOptions = {}): Buffer {
  const { realTime = false, twoByte = false } = options;
  const encodeValue = twoByte ? encode2ByteValue : encode1ByteValue;

  const bytes: number[] = [
    SYSEX_START,
    realTime ? REAL_TIME : NON_REAL_TIME,
    ALL_DEVICES,
    MIDI_TUNING,
    twoByte ? FORM_2_BYTE : FORM_1_BYTE,
    ...ALL_CHANNELS,
  ];
  for (const deviation of tuning.deviations) {
    bytes.push(...encodeValue(deviation));
  }
  bytes.push(SYSEX_END);

  return Buffer.from(bytes);
}

/** Uppercase hex bytes separated by spaces: `F0 7E 7F 08 …`. */
export function formatSysExHex(message: Buffer): string {
  return [...message].map((b) => b.toString(16).toUpperCase().padStart(2, "0")).join(" ");
}
