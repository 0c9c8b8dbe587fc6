import { z } from "zod";
import { CLIMATE_VARIABLES } from "../sources/variables.js";

// ── Raw daily record, as handed over by the data-fetch collaborator ──

export const ClimateVariableSchema = z.enum(CLIMATE_VARIABLES);

// NaN passes the schema so that it can be classified as missing
export const RawRecordSchema = z
  .object({
    date: z.string().min(1),
    value: z.union([z.number(), z.nan(), z.null()]),
    variable: ClimateVariableSchema.optional(),
  })
  .strict();

export type RawRecord = z.infer<typeof RawRecordSchema>;

export const AnalysisQuerySchema = z.object({
  location: z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    label: z.string().optional(),
  }),
  variable: ClimateVariableSchema,
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
  windowDays: z.number().int().min(0).max(90),
});

/**
 * Classification of one raw record at the normalizer boundary.
 * Ambiguous input is `malformed`, never coerced.
 */
export type ClassifiedRecord =
  | { kind: "valid"; index: number; date: string; value: number }
  | { kind: "missing"; index: number; date: string }
  | { kind: "malformed"; index: number; issues: string[] };
