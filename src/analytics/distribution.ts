/**
 * Distribution Modeler — fits a parametric family to a SampleSet and derives
 * the percentile table and uncertainty bands.
 *
 * Estimator: method of moments, with the n − 1 sample variance everywhere.
 *   normal     μ = mean, σ = sample std dev
 *   lognormal  μ, σ = mean and sample std dev of ln(x)
 *   gamma      shape = mean² / variance, scale = variance / mean
 */

import jStat from "jstat";
import { DegenerateFitError, DistributionFitError } from "../shared/errors.js";
import { DEFAULT_QUANTILES } from "../shared/run_config.js";
import { getVariableInfo } from "../sources/variables.js";
import { mean, sampleVariance } from "./stats.js";
import type {
  DistributionFamily,
  DistributionParameters,
  DistributionResult,
  Percentile,
  SampleSet,
  UncertaintyBand,
} from "../shared/types.js";

export const DISTRIBUTION_FAMILIES: readonly DistributionFamily[] = ["normal", "lognormal", "gamma"];

export interface FitDistributionOptions {
  quantiles?: readonly number[];
}

const BANDS = [
  { label: "p10-p90", coverage: 0.8, lower: 0.1, upper: 0.9 },
  { label: "p25-p75", coverage: 0.5, lower: 0.25, upper: 0.75 },
] as const;

export function isDistributionFamily(value: string): value is DistributionFamily {
  return DISTRIBUTION_FAMILIES.some((f) => f === value);
}

// ── Per-family functions ─────────────────────────────────────────────

export function cdf(params: DistributionParameters, x: number): number {
  switch (params.family) {
    case "normal":
      return jStat.normal.cdf(x, params.mean, params.stdDev);
    case "lognormal":
      return x <= 0 ? 0 : jStat.lognormal.cdf(x, params.logMean, params.logStdDev);
    case "gamma":
      return x <= 0 ? 0 : jStat.gamma.cdf(x, params.shape, params.scale);
  }
}

export function pdf(params: DistributionParameters, x: number): number {
  switch (params.family) {
    case "normal":
      return jStat.normal.pdf(x, params.mean, params.stdDev);
    case "lognormal":
      return x <= 0 ? 0 : jStat.lognormal.pdf(x, params.logMean, params.logStdDev);
    case "gamma":
      return x < 0 ? 0 : jStat.gamma.pdf(x, params.shape, params.scale);
  }
}

export function quantile(params: DistributionParameters, p: number): number {
  switch (params.family) {
    case "normal":
      return jStat.normal.inv(p, params.mean, params.stdDev);
    case "lognormal":
      return jStat.lognormal.inv(p, params.logMean, params.logStdDev);
    case "gamma":
      return jStat.gamma.inv(p, params.shape, params.scale);
  }
}

/** Mean and standard deviation implied by fitted parameters. */
export function moments(params: DistributionParameters): { mean: number; stdDev: number } {
  switch (params.family) {
    case "normal":
      return { mean: params.mean, stdDev: params.stdDev };
    case "lognormal": {
      const s2 = params.logStdDev ** 2;
      const m = Math.exp(params.logMean + s2 / 2);
      return { mean: m, stdDev: Math.sqrt((Math.exp(s2) - 1) * m * m) };
    }
    case "gamma":
      return {
        mean: params.shape * params.scale,
        stdDev: Math.sqrt(params.shape) * params.scale,
      };
  }
}

// ── Estimation ───────────────────────────────────────────────────────

function estimateParameters(family: DistributionFamily, values: number[]): DistributionParameters {
  if (family === "lognormal" || family === "gamma") {
    const nonPositive = values.filter((v) => v <= 0);
    if (nonPositive.length > 0) {
      throw new DistributionFitError(
        `The ${family} family requires strictly positive values; ${nonPositive.length} sample(s) are <= 0.`,
        `Use the "normal" family for data that includes zero or negative values.`,
        { family, nonPositiveCount: nonPositive.length, minimum: Math.min(...values) }
      );
    }
  }

  // Compared on the raw values: the mean of identical values need not round back exactly
  if (values.every((v) => v === values[0])) {
    throw new DegenerateFitError(
      "distribution",
      `Cannot fit a ${family} distribution: all ${values.length} samples equal ${values[0]}.`,
      { family, sampleSize: values.length, value: values[0] }
    );
  }

  const transformed = family === "lognormal" ? values.map((v) => Math.log(v)) : values;
  const m = mean(transformed);
  const variance = sampleVariance(transformed);

  switch (family) {
    case "normal":
      return { family, mean: m, stdDev: Math.sqrt(variance) };
    case "lognormal":
      return { family, logMean: m, logStdDev: Math.sqrt(variance) };
    case "gamma":
      return { family, shape: (m * m) / variance, scale: variance / m };
  }
}

/**
 * Fit `family` (or the variable's default family) to the samples.
 *
 * @throws DistributionFitError for an unknown family or a family whose domain
 *   excludes the data
 * @throws DegenerateFitError when every sample has the same value
 */
export function fitDistribution(
  sampleSet: SampleSet,
  family?: string,
  options: FitDistributionOptions = {}
): DistributionResult {
  const chosen = family ?? getVariableInfo(sampleSet.variable).defaultFamily;
  if (!isDistributionFamily(chosen)) {
    throw new DistributionFitError(
      `Unknown distribution family "${chosen}".`,
      `Choose one of: ${DISTRIBUTION_FAMILIES.join(", ")}.`,
      { family: chosen }
    );
  }

  const values = sampleSet.samples.map((s) => s.value);
  if (values.length < 2) {
    throw new DistributionFitError(
      `Cannot fit a ${chosen} distribution to ${values.length} sample(s).`,
      "Provide at least two sampled years.",
      { family: chosen, sampleSize: values.length }
    );
  }

  const parameters = estimateParameters(chosen, values);
  const quantiles = options.quantiles ?? DEFAULT_QUANTILES;

  const percentiles: Percentile[] = [...quantiles]
    .sort((a, b) => a - b)
    .map((q) => ({ quantile: q, value: quantile(parameters, q) }));

  const bands: UncertaintyBand[] = BANDS.map((b) => ({
    label: b.label,
    coverage: b.coverage,
    lower: quantile(parameters, b.lower),
    upper: quantile(parameters, b.upper),
  }));

  return {
    sampleSetFingerprint: sampleSet.fingerprint,
    sampleSize: values.length,
    family: chosen,
    estimator: "method_of_moments",
    parameters,
    percentiles,
    bands,
  };
}
