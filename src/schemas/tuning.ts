/**
 * Zod schemas shared by the tuning tools: scales, references, mappers.
 */

import { z } from "zod";

import { SOFT_CHROMATIC_GENUS_MAPPINGS } from "../mapper/soft-chromatic-genus.js";
import {
  CONCERT_PITCH_FREQ,
  DEFAULT_CENTS_TOLERANCE,
  DEFAULT_QUARTER_TONE_TOLERANCE,
  MAX_EXCLUSIVE_DEVIATION,
  MIN_EXCLUSIVE_DEVIATION,
} from "../tuning/defaults.js";

export const intervalSchema = z
  .union([z.string().min(1), z.number()])
  .describe(
    'Interval: cents ("386.31" or a number), ratio ("5/4", "2") or EDO step ("4\\\\72").',
  );

export const scaleSchema = z.object({
  name: z.string().default("").describe("Scale name, used as the tuning name."),
  intervals: z
    .array(intervalSchema)
    .min(1)
    .describe('Scale degrees from the base, e.g. ["1/1", "9/8", "5/4", "4/3"].'),
});

export const keyboardMappingSchema = z
  .record(z.string(), z.number().int().min(0))
  .describe('Key → scale degree index, e.g. { "C": 0, "D": 1, "F#": 3 }. Keys may also be 0-11.');

export const tuningReferenceSchema = z
  .discriminatedUnion("type", [
    z.object({
      type: z.literal("standard"),
      basePitchClass: z
        .union([z.string(), z.number().int()])
        .default("C")
        .describe('Key of the base, e.g. "D", "F#", "Bb" or 0-11.'),
      baseDeviation: z.number().default(0).describe("Base detuning in cents."),
    }),
    z.object({
      type: z.literal("concertPitch"),
      concertPitchToBaseInterval: intervalSchema
        .default("1/1")
        .describe("Interval from the concert pitch to the base."),
      baseMidiNote: z
        .union([z.string(), z.number().int()])
        .default(69)
        .describe('MIDI note that plays the base: number or name like "C5", "A4".'),
      concertPitchFreq: z
        .number()
        .positive()
        .default(CONCERT_PITCH_FREQ)
        .describe("Concert pitch frequency in Hz."),
    }),
  ])
  .describe("Where the base of the scale sits on the keyboard.");

export const tuningMapperSchema = z
  .discriminatedUnion("type", [
    z.object({
      type: z.literal("auto"),
      mapQuarterTonesLow: z
        .boolean()
        .default(false)
        .describe("Map quarter tones to the lower key (C♯ +50) instead of the upper one (D -50)."),
      quarterToneTolerance: z
        .number()
        .min(0)
        .max(50)
        .default(DEFAULT_QUARTER_TONE_TOLERANCE)
        .describe("Cents around 50 that still count as a quarter tone."),
      softChromaticGenusMapping: z
        .enum(SOFT_CHROMATIC_GENUS_MAPPINGS)
        .default("off")
        .describe('Soft Hijaz layout: "off", "strict" or "pseudoChromatic".'),
      overrideKeyboardMapping: keyboardMappingSchema.optional(),
      tolerance: z
        .number()
        .positive()
        .default(DEFAULT_CENTS_TOLERANCE)
        .describe("Deviations closer than this are equal."),
    }),
    z.object({
      type: z.literal("manual"),
      keyboardMapping: keyboardMappingSchema,
      minExclusiveDeviation: z.number().default(MIN_EXCLUSIVE_DEVIATION),
      maxExclusiveDeviation: z.number().default(MAX_EXCLUSIVE_DEVIATION),
    }),
  ])
  .describe("How scale degrees are put on keys.");

export const tuningSpecSchema = z.object({
  scale: scaleSchema,
  transposition: intervalSchema.default("1/1").describe("Transposition from the composition base."),
  mapper: tuningMapperSchema.default({ type: "auto" }),
});

export type IntervalInput = z.infer<typeof intervalSchema>;
export type ScaleInput = z.infer<typeof scaleSchema>;
export type KeyboardMappingInput = z.infer<typeof keyboardMappingSchema>;
export type TuningReferenceInput = z.infer<typeof tuningReferenceSchema>;
export type TuningMapperInput = z.infer<typeof tuningMapperSchema>;
export type TuningSpecInput = z.infer<typeof tuningSpecSchema>;
