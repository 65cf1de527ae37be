/**
 * encode_mts MCP tool.
 *
 * Encodes 12 deviations as an MTS octave tuning SysEx message.
 */

import { encodeMtsOctaveTuning, formatSysExHex } from "../mts/mts-encoder.js";
import type { EncodeMtsInput } from "../schemas/mts.js";
import { formatTuning } from "../tuning/format.js";
import { createOctaveTuning } from "../tuning/octave-tuning.js";

/**
 * Execute the encode_mts tool.
 * @returns Report with the tuning and the SysEx bytes as hex
 */
export function executeEncodeMts(input: EncodeMtsInput): string {
  const tuning = createOctaveTuning(input.name, input.deviations);
  const message = encodeMtsOctaveTuning(tuning, { realTime: input.realTime, twoByte: input.twoByte });

  const lines: string[] = [];
  lines.push(formatTuning(tuning));
  lines.push(
    `MTS ${input.twoByte ? "2-byte" : "1-byte"} ${input.realTime ? "real-time" : "non-real-time"}, ` +
      `${message.length} bytes:`,
  );
  lines.push(formatSysExHex(message));
  return lines.join("\n");
}
