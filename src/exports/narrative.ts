import { getVariableInfo } from "../sources/variables.js";
import type { AnalysisResult } from "../shared/types.js";

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

export type VolatilityLabel = "more volatile" | "generally stable";

export interface InsightNarrative {
  headline: string;
  bullets: string[];
  volatility: VolatilityLabel;
  fullText: string;
}

export function formatTargetDay(month: number, day: number): string {
  return `${MONTH_NAMES[month - 1]} ${String(day).padStart(2, "0")}`;
}

/**
 * Plain-language summary of one analysis, for the presentation layer.
 * Values are formatted to two decimals; the underlying result is untouched.
 */
export function buildInsightNarrative(
  result: AnalysisResult,
  options: { volatilityThreshold?: number } = {}
): InsightNarrative {
  const volatilityThreshold = options.volatilityThreshold ?? 0.15;
  const { query, sampleSet, trend, extreme, distribution } = result;
  const info = getVariableInfo(sampleSet.variable);
  const place = query.location.label ?? `${query.location.latitude}, ${query.location.longitude}`;
  const years = sampleSet.samples.length;
  const firstYear = sampleSet.samples[0]?.year;
  const lastYear = sampleSet.samples[years - 1]?.year;

  const volatility: VolatilityLabel =
    extreme.exceedanceProbability > volatilityThreshold ? "more volatile" : "generally stable";

  const windowText = query.windowDays > 0 ? ` (±${query.windowDays} days)` : "";
  const article = trend.direction === "increasing" ? "an" : "a";
  const headline =
    `On ${formatTargetDay(query.month, query.day)}${windowText}, ${info.label.toLowerCase()} in ${place} ` +
    `has shown ${article} ${trend.direction} pattern over ${years} years (${firstYear}–${lastYear}).`;

  const p10 = distribution.percentiles.find((p) => Math.abs(p.quantile - 0.1) < 1e-12);
  const p90 = distribution.percentiles.find((p) => Math.abs(p.quantile - 0.9) < 1e-12);

  const bullets = [
    `Typical value: ${extreme.mean.toFixed(2)} ${info.unit}`,
    `Trend: ${trend.slopePerDecade >= 0 ? "+" : ""}${trend.slopePerDecade.toFixed(2)} ${info.unit} per decade (R² ${trend.rSquared.toFixed(2)})`,
    `Rare extremes (≥ ${extreme.threshold.toFixed(2)} ${info.unit}) occurred in ~${(extreme.exceedanceProbability * 100).toFixed(1)}% of years`,
  ];
  if (p10 && p90) {
    bullets.push(
      `8 in 10 years fall between ${p10.value.toFixed(2)} and ${p90.value.toFixed(2)} ${info.unit} (${distribution.family} fit)`
    );
  }

  const closing = `This means the selected day is historically ${volatility}.`;
  const fullText = [headline, "", ...bullets.map((b) => `• ${b}`), "", closing].join("\n");

  return { headline, bullets, volatility, fullText };
}
