import {
  DegenerateFitError,
  InconsistentResultError,
  InsufficientDataError,
} from "../shared/errors.js";
import { cdf } from "./distribution.js";
import { mean, sampleStdDev } from "./stats.js";
import type { DistributionResult, ExtremeResult, SampleSet } from "../shared/types.js";

/** Number of standard deviations above the mean that marks an extreme. */
export const EXTREME_SIGMA = 2;

export interface EstimateExtremesOptions {
  /** Fitted distribution of the same SampleSet, for the theoretical estimate. */
  distribution?: DistributionResult;
}

/**
 * Estimate the μ+2σ extreme threshold and its exceedance probability.
 *
 * Standard deviation uses the n − 1 denominator. The empirical probability
 * counts samples with value >= threshold; the theoretical one is
 * 1 − CDF(threshold) under the supplied distribution.
 */
export function estimateExtremes(
  sampleSet: SampleSet,
  options: EstimateExtremesOptions = {}
): ExtremeResult {
  const values = sampleSet.samples.map((s) => s.value);
  if (values.length < 2) {
    throw new InsufficientDataError(
      "extremes",
      `Sample standard deviation needs at least 2 samples; got ${values.length}.`,
      { available: values.length, required: 2 },
      { fingerprint: sampleSet.fingerprint }
    );
  }

  const { distribution } = options;
  if (distribution && distribution.sampleSetFingerprint !== sampleSet.fingerprint) {
    throw new InconsistentResultError(
      "extremes",
      "Distribution was fitted to a different SampleSet than the one being estimated.",
      {
        sampleSetFingerprint: sampleSet.fingerprint,
        distributionFingerprint: distribution.sampleSetFingerprint,
      }
    );
  }

  if (values.every((v) => v === values[0])) {
    throw new DegenerateFitError(
      "extremes",
      `All ${values.length} samples equal ${values[0]}; exceedance probability is undefined.`,
      { sampleSize: values.length, value: values[0], fingerprint: sampleSet.fingerprint }
    );
  }

  const avg = mean(values);
  const sd = sampleStdDev(values);

  const threshold = avg + EXTREME_SIGMA * sd;
  const exceedanceCount = values.filter((v) => v >= threshold).length;

  return {
    sampleSetFingerprint: sampleSet.fingerprint,
    sampleSize: values.length,
    mean: avg,
    stdDev: sd,
    threshold,
    exceedanceCount,
    exceedanceProbability: exceedanceCount / values.length,
    theoreticalExceedanceProbability: distribution
      ? 1 - cdf(distribution.parameters, threshold)
      : null,
    min: Math.min(...values),
    max: Math.max(...values),
  };
}
