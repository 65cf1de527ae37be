/**
 * Zod schemas for build_tuning_list tool parameters and composition files.
 */

import { z } from "zod";

import { DEFAULT_CENTS_TOLERANCE } from "../tuning/defaults.js";
import { tuningReferenceSchema, tuningSpecSchema } from "./tuning.js";

export const compositionSchema = z.object({
  name: z.string().optional(),
  composerName: z.string().optional(),
  author: z.string().optional(),
  reference: tuningReferenceSchema.default({ type: "standard" }),
  tunings: z.array(tuningSpecSchema).describe("Tuning specs in performance order."),
  reducer: z
    .object({
      type: z.enum(["direct", "merge"]).default("merge"),
      equalityTolerance: z.number().positive().default(DEFAULT_CENTS_TOLERANCE),
    })
    .default({})
    .describe('"merge" collapses compatible consecutive tunings; "direct" keeps one tuning per spec.'),
  globalFill: tuningSpecSchema
    .optional()
    .describe("Tuning for keys no tuning defines. Defaults to 12-EDO."),
});

export type CompositionInput = z.infer<typeof compositionSchema>;

export const buildTuningListSchema = {
  composition: z
    .union([compositionSchema, z.string().min(1)])
    .describe(
      "Composition object, or an absolute path to a composition .json file, or raw JSON text. " +
        "If the string starts with '{' it is treated as raw JSON.",
    ),
  mts: z
    .enum(["none", "1-byte", "2-byte"])
    .default("none")
    .describe("Append an MTS octave tuning SysEx dump for each tuning."),
  realTime: z.boolean().default(false).describe("Use real-time MTS messages."),
};

export type BuildTuningListInput = z.infer<z.ZodObject<typeof buildTuningListSchema>>;
