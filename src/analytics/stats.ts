/**
 * Calculate arithmetic mean of an array of numbers.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sum = values.reduce((a, b) => a + b, 0);
  return sum / values.length;
}

/**
 * Unbiased sample variance (n − 1 denominator).
 * NaN for fewer than two values.
 */
export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const avg = mean(values);
  const squaredDiffs = values.map((v) => (v - avg) ** 2);
  return squaredDiffs.reduce((a, b) => a + b, 0) / (values.length - 1);
}

/**
 * Sample standard deviation (n − 1 denominator).
 */
export function sampleStdDev(values: readonly number[]): number {
  return Math.sqrt(sampleVariance(values));
}

/**
 * Round to specified decimal places.
 */
export function round(value: number, decimals: number = 4): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
