import { DegenerateFitError } from "../shared/errors.js";
import type { SampleSet, TrendDirection, TrendResult } from "../shared/types.js";

/** |slope| below this is reported as "stable". */
export const STABLE_SLOPE_EPSILON = 1e-9;

/**
 * Ordinary least-squares regression of value on calendar year.
 *
 * The year itself is the regressor, so gaps in the record do not distort the
 * slope. Samples are put into canonical year order before any summation, so
 * the same samples in any order give bit-identical results.
 */
export function fitTrend(sampleSet: SampleSet): TrendResult {
  const ordered = [...sampleSet.samples].sort((a, b) => a.year - b.year || a.value - b.value);
  const n = ordered.length;
  const distinctYears = new Set(ordered.map((s) => s.year)).size;

  if (distinctYears < 2) {
    throw new DegenerateFitError(
      "trend",
      `Trend regression needs at least 2 distinct years; got ${distinctYears}.`,
      { sampleSize: n, distinctYears, fingerprint: sampleSet.fingerprint }
    );
  }

  const xs = ordered.map((s) => s.year);
  const ys = ordered.map((s) => s.value);
  const xMean = xs.reduce((a, b) => a + b, 0) / n;
  // A constant series is flat by definition; its summed mean may not round back to the value
  const constant = ys.every((y) => y === ys[0]);
  const yMean = constant ? ys[0] : ys.reduce((a, b) => a + b, 0) / n;

  // Centered sums keep precision when years are large numbers
  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - xMean;
    const dy = ys[i] - yMean;
    sxx += dx * dx;
    sxy += dx * dy;
    syy += dy * dy;
  }

  const slope = sxy / sxx;
  const intercept = yMean - slope * xMean;

  const fitted = xs.map((year) => ({ year, value: intercept + slope * year }));
  let ssRes = 0;
  for (let i = 0; i < n; i++) {
    ssRes += (ys[i] - fitted[i].value) ** 2;
  }

  const rSquared = syy === 0 ? 1 : 1 - ssRes / syy;
  const dof = n - 2;
  const residualStdError = dof > 0 ? Math.sqrt(ssRes / dof) : 0;
  const slopeStdError = dof > 0 ? residualStdError / Math.sqrt(sxx) : 0;

  let direction: TrendDirection = "stable";
  if (slope > STABLE_SLOPE_EPSILON) direction = "increasing";
  else if (slope < -STABLE_SLOPE_EPSILON) direction = "decreasing";

  return {
    sampleSetFingerprint: sampleSet.fingerprint,
    sampleSize: n,
    slope,
    intercept,
    slopePerDecade: slope * 10,
    rSquared,
    residualStdError,
    slopeStdError,
    direction,
    fitted,
  };
}
