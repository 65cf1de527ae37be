/**
 * Zod schema for map_scale tool parameters.
 */

import { z } from "zod";

import { intervalSchema, scaleSchema, tuningMapperSchema, tuningReferenceSchema } from "./tuning.js";

export const mapScaleSchema = {
  scale: scaleSchema,
  transposition: intervalSchema.default("1/1").describe("Transposition applied to the scale."),
  reference: tuningReferenceSchema.default({ type: "standard" }),
  mapper: tuningMapperSchema.default({ type: "auto" }),
};

export type MapScaleInput = z.infer<z.ZodObject<typeof mapScaleSchema>>;
