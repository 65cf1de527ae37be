/**
 * map_scale MCP tool.
 *
 * Maps one scale onto the 12 keyboard keys and reports the resulting
 * partial tuning and keyboard mapping.
 */

import { formatInterval, type Interval } from "../intonation/interval.js";
import { pitchClassName } from "../intonation/pitch-class.js";
import type { Scale } from "../intonation/scale.js";
import type { MapScaleInput } from "../schemas/map-scale.js";
import { formatPianoKeyboard, formatTuning } from "../tuning/format.js";
import { keyboardMappingEntries, type KeyboardMapping } from "../tuning/keyboard-mapping.js";
import { completedCount, type PartialTuning } from "../tuning/partial-tuning.js";
import { describeTuningReference, type TuningReference } from "../tuning/tuning-reference.js";
import { toInterval, toScale, toTuningMapper, toTuningReference } from "./coerce.js";

export interface MapScaleResult {
  scale: Scale;
  transposition: Interval;
  reference: TuningReference;
  tuning: PartialTuning;
  keyboardMapping: KeyboardMapping;
}

/**
 * Execute the map_scale tool.
 * Mapper errors (conflict, overflow, invalid configuration) propagate.
 */
export function executeMapScale(input: MapScaleInput): MapScaleResult {
  const scale = toScale(input.scale);
  const transposition = toInterval(input.transposition);
  const reference = toTuningReference(input.reference);
  const mapper = toTuningMapper(input.mapper);

  const tuning = mapper.mapScale(scale, reference, transposition);
  const keyboardMapping = mapper.type === "auto"
    ? mapper.keyboardMappingOf(scale, reference, transposition)
    : mapper.keyboardMapping;

  return { scale, transposition, reference, tuning, keyboardMapping };
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatMapScaleResult(result: MapScaleResult): string {
  const { scale, transposition, reference, tuning, keyboardMapping } = result;
  const lines: string[] = [];

  lines.push(`# Tuning: ${tuning.name || "(unnamed)"}`);
  lines.push(`Reference: ${describeTuningReference(reference)}`);
  lines.push(`Transposition: ${formatInterval(transposition)}`);
  lines.push(`Keys mapped: ${completedCount(tuning)}/12`);
  lines.push("");
  lines.push(formatTuning(tuning));
  lines.push("");
  lines.push("```");
  lines.push(formatPianoKeyboard(tuning));
  lines.push("```");
  lines.push("");

  lines.push("## Keyboard mapping");
  for (const [pitchClass, index] of keyboardMappingEntries(keyboardMapping)) {
    const interval = scale.intervals[index];
    lines.push(`  ${pitchClassName(pitchClass)}: degree ${index} (${formatInterval(interval)})`);
  }

  return lines.join("\n");
}
