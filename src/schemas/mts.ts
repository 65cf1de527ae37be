/**
 * Zod schema for encode_mts tool parameters.
 */

import { z } from "zod";

import { TUNING_SIZE } from "../tuning/defaults.js";

export const encodeMtsSchema = {
  name: z.string().default("").describe("Tuning name, shown in the report."),
  deviations: z
    .array(z.number())
    .length(TUNING_SIZE)
    .describe("12 deviations in cents, C first."),
  twoByte: z.boolean().default(false).describe("2-byte form (finer resolution) instead of 1-byte."),
  realTime: z.boolean().default(false).describe("Real-time instead of non-real-time SysEx."),
};

export type EncodeMtsInput = z.infer<z.ZodObject<typeof encodeMtsSchema>>;
