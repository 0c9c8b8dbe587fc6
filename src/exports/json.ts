import { z } from "zod";
import { AnalysisQuerySchema, ClimateVariableSchema } from "../series/schemas.js";
import type { AnalysisResult } from "../shared/types.js";

const SampleSetSchema = z.object({
  variable: ClimateVariableSchema,
  target: z.object({
    month: z.number().int(),
    day: z.number().int(),
    windowDays: z.number().int(),
  }),
  samples: z.array(
    z.object({ year: z.number().int(), value: z.number(), observations: z.number().int() })
  ),
  fingerprint: z.string().regex(/^[a-f0-9]{64}$/),
});

const TrendResultSchema = z.object({
  sampleSetFingerprint: z.string(),
  sampleSize: z.number().int(),
  slope: z.number(),
  intercept: z.number(),
  slopePerDecade: z.number(),
  rSquared: z.number(),
  residualStdError: z.number(),
  slopeStdError: z.number(),
  direction: z.enum(["increasing", "decreasing", "stable"]),
  fitted: z.array(z.object({ year: z.number().int(), value: z.number() })),
});

const ExtremeResultSchema = z.object({
  sampleSetFingerprint: z.string(),
  sampleSize: z.number().int(),
  mean: z.number(),
  stdDev: z.number(),
  threshold: z.number(),
  exceedanceCount: z.number().int(),
  exceedanceProbability: z.number(),
  theoreticalExceedanceProbability: z.number().nullable(),
  min: z.number(),
  max: z.number(),
});

const DistributionParametersSchema = z.discriminatedUnion("family", [
  z.object({ family: z.literal("normal"), mean: z.number(), stdDev: z.number() }),
  z.object({ family: z.literal("lognormal"), logMean: z.number(), logStdDev: z.number() }),
  z.object({ family: z.literal("gamma"), shape: z.number(), scale: z.number() }),
]);

const DistributionResultSchema = z.object({
  sampleSetFingerprint: z.string(),
  sampleSize: z.number().int(),
  family: z.enum(["normal", "lognormal", "gamma"]),
  estimator: z.literal("method_of_moments"),
  parameters: DistributionParametersSchema,
  percentiles: z.array(z.object({ quantile: z.number(), value: z.number() })),
  bands: z.array(
    z.object({ label: z.string(), coverage: z.number(), lower: z.number(), upper: z.number() })
  ),
});

export const AnalysisResultSchema = z.object({
  query: AnalysisQuerySchema,
  sampleSet: SampleSetSchema,
  trend: TrendResultSchema,
  extreme: ExtremeResultSchema,
  distribution: DistributionResultSchema,
});

export function serializeAnalysis(result: AnalysisResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Parse a serialized AnalysisResult. The fingerprints are carried over as
 * stored; pass the result through `aggregate` again to re-verify them.
 */
export function deserializeAnalysis(text: string): AnalysisResult {
  return AnalysisResultSchema.parse(JSON.parse(text));
}
