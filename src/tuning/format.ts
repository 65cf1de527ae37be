/**
 * Text renderings of tunings for reports.
 */

import { PITCH_CLASS_NAMES } from "../intonation/pitch-class.js";
import type { Deviation } from "./partial-tuning.js";

interface DisplayableTuning {
  readonly name: string;
  readonly deviations: readonly Deviation[];
}

const MISSING_DEVIATION = "  --  ";
const KEY_WIDTH = 12;

/** Signed, two decimals, zero-padded to 6 characters: `+03.91`, `-13.69`. */
export function formatDeviation(deviation: Deviation): string {
  if (deviation === undefined) return MISSING_DEVIATION;
  const sign = deviation < 0 ? "-" : "+";
  return sign + Math.abs(deviation).toFixed(2).padStart(5, "0");
}

/** `"Rast" (C = +00.00, C♯/D♭ = --, …)` */
export function formatTuning(tuning: DisplayableTuning): string {
  const keys = tuning.deviations.map((d, pc) =>
    `${PITCH_CLASS_NAMES[pc]} = ${d === undefined ? "--" : formatDeviation(d)}`);
  return `"${tuning.name}" (${keys.join(", ")})`;
}

/** ASCII piano, named: black keys on the first line, white keys on the second. */
export function formatPianoKeyboard(tuning: DisplayableTuning): string {
  const d = tuning.deviations;
  const pad = (deviation: Deviation) => formatDeviation(deviation).padEnd(KEY_WIDTH, " ");
  const gap = " ".repeat(MISSING_DEVIATION.length);

  const blackKeys = [pad(d[1]), pad(d[3]), gap, gap, pad(d[6]), pad(d[8]), pad(d[10])].join("");
  const whiteKeys = [d[0], d[2], d[4], d[5], d[7], d[9], d[11]].map(pad).join("");

  return `${tuning.name}:\n${gap}${blackKeys}\n${whiteKeys}`;
}
