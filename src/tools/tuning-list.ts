/**
 * build_tuning_list MCP tool.
 *
 * Loads a composition (inline, from a .json file or raw JSON text), maps
 * every tuning spec, reduces them and reports the tuning list.
 */

import path from "node:path";

import type { Composition } from "../composition/types.js";
import { tuningListFromComposition } from "../composition/tuning-list.js";
import { encodeMtsOctaveTuning, formatSysExHex } from "../mts/mts-encoder.js";
import { createDirectTuningReducer } from "../reducer/direct-reducer.js";
import { createMergeTuningReducer } from "../reducer/merge-reducer.js";
import { compositionSchema, type BuildTuningListInput, type CompositionInput } from "../schemas/tuning-list.js";
import { formatPianoKeyboard } from "../tuning/format.js";
import type { OctaveTuning } from "../tuning/octave-tuning.js";
import { describeTuningReference } from "../tuning/tuning-reference.js";
import { resolveJsonSource } from "../utils/resolve-source.js";
import { toTuningReference, toTuningSpec } from "./coerce.js";

export type MtsForm = BuildTuningListInput["mts"];

export interface BuildTuningListResult {
  composition: Composition;
  tunings: OctaveTuning[];
  filePath?: string;
}

/**
 * Execute the build_tuning_list tool.
 * Mapper errors propagate unchanged; nothing is partially returned.
 */
export async function executeBuildTuningList(
  input: Pick<BuildTuningListInput, "composition">,
): Promise<BuildTuningListResult> {
  const { composition: source } = input;
  const { compositionInput, filePath } = typeof source === "string"
    ? await loadComposition(source)
    : { compositionInput: source, filePath: undefined };

  const composition = toComposition(compositionInput);
  const tunings = tuningListFromComposition(composition);
  return { composition, tunings, filePath };
}

async function loadComposition(
  source: string,
): Promise<{ compositionInput: CompositionInput; filePath?: string }> {
  const { value, filePath } = await resolveJsonSource(source);
  const parsed = compositionSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid composition: ${issues}`);
  }
  return { compositionInput: parsed.data, filePath };
}

export function toComposition(input: CompositionInput): Composition {
  const tuningReducer = input.reducer.type === "merge"
    ? createMergeTuningReducer({ equalityTolerance: input.reducer.equalityTolerance })
    : createDirectTuningReducer();

  return {
    tuningReference: toTuningReference(input.reference),
    tuningSpecs: input.tunings.map(toTuningSpec),
    tuningReducer,
    fill: { global: input.globalFill ? toTuningSpec(input.globalFill) : undefined },
    metadata: { name: input.name, composerName: input.composerName, author: input.author },
  };
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export interface FormatTuningListOptions {
  mts?: MtsForm;
  realTime?: boolean;
}

export function formatTuningListResult(
  result: BuildTuningListResult,
  options: FormatTuningListOptions = {},
): string {
  const { composition, tunings, filePath } = result;
  const { mts = "none", realTime = false } = options;
  const lines: string[] = [];

  const title = composition.metadata?.name ?? (filePath ? path.basename(filePath) : "Composition");
  lines.push(`# Tuning list: ${title}`);
  if (filePath) lines.push(`Path: ${filePath}`);
  lines.push(`Reference: ${describeTuningReference(composition.tuningReference)}`);
  lines.push(
    `Reducer: ${composition.tuningReducer.type}, ${composition.tuningSpecs.length} spec(s) → ${tunings.length} tuning(s)`,
  );
  lines.push("");

  tunings.forEach((tuning, i) => {
    lines.push(`## ${i + 1}. ${tuning.name || "(unnamed)"}`);
    lines.push("```");
    lines.push(formatPianoKeyboard(tuning));
    lines.push("```");
    if (mts !== "none") {
      const message = encodeMtsOctaveTuning(tuning, { realTime, twoByte: mts === "2-byte" });
      lines.push(`MTS (${mts}, ${message.length} bytes): ${formatSysExHex(message)}`);
    }
    lines.push("");
  });

  return lines.join("\n").trimEnd();
}
