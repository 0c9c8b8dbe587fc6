/**
 * Tabular export of an AnalysisResult.
 *
 * Numbers are written with `String(n)`, the shortest text that parses back
 * to the same double, so every value survives a write/read cycle unchanged.
 */

import { parse } from "csv-parse/sync";
import type { AnalysisResult, DistributionParameters } from "../shared/types.js";

export interface SampleRow {
  year: number;
  date: string;
  value: number;
  observations: number;
  fitted: number;
}

export const SAMPLE_CSV_HEADER = ["year", "date", "value", "observations", "fitted"] as const;

function num(value: number): string {
  return String(value);
}

function toNumber(cell: string, where: string): number {
  const n = Number(cell);
  if (cell.trim() === "" || Number.isNaN(n)) {
    throw new Error(`Expected a number for ${where}, got "${cell}"`);
  }
  return n;
}

// ── Samples ──────────────────────────────────────────────────────────

export function samplesToCsv(result: AnalysisResult): string {
  const { target } = result.sampleSet;
  const mmdd = `${String(target.month).padStart(2, "0")}-${String(target.day).padStart(2, "0")}`;
  const fittedByYear = new Map(result.trend.fitted.map((f) => [f.year, f.value]));

  const lines = [SAMPLE_CSV_HEADER.join(",")];
  for (const s of result.sampleSet.samples) {
    lines.push(
      [num(s.year), `${s.year}-${mmdd}`, num(s.value), num(s.observations), num(fittedByYear.get(s.year) ?? NaN)].join(",")
    );
  }
  return lines.join("\n") + "\n";
}

export function parseSamplesCsv(text: string): SampleRow[] {
  const rows = parse(text, { columns: true, skip_empty_lines: true, trim: true }) as Record<string, string>[];
  return rows.map((row, i) => ({
    year: toNumber(row.year ?? "", `row ${i + 1} year`),
    date: row.date ?? "",
    value: toNumber(row.value ?? "", `row ${i + 1} value`),
    observations: toNumber(row.observations ?? "", `row ${i + 1} observations`),
    fitted: toNumber(row.fitted ?? "", `row ${i + 1} fitted`),
  }));
}

// ── Summary ──────────────────────────────────────────────────────────

function parameterEntries(params: DistributionParameters): Array<[string, number]> {
  switch (params.family) {
    case "normal":
      return [["mean", params.mean], ["stdDev", params.stdDev]];
    case "lognormal":
      return [["logMean", params.logMean], ["logStdDev", params.logStdDev]];
    case "gamma":
      return [["shape", params.shape], ["scale", params.scale]];
  }
}

/** Flat metric → value view of every numeric field in the result. */
export function summaryMetrics(result: AnalysisResult): Array<[string, number | null]> {
  const { trend, extreme, distribution, query } = result;
  return [
    ["query.latitude", query.location.latitude],
    ["query.longitude", query.location.longitude],
    ["query.month", query.month],
    ["query.day", query.day],
    ["query.windowDays", query.windowDays],
    ["trend.sampleSize", trend.sampleSize],
    ["trend.slope", trend.slope],
    ["trend.intercept", trend.intercept],
    ["trend.slopePerDecade", trend.slopePerDecade],
    ["trend.rSquared", trend.rSquared],
    ["trend.residualStdError", trend.residualStdError],
    ["trend.slopeStdError", trend.slopeStdError],
    ["extreme.sampleSize", extreme.sampleSize],
    ["extreme.mean", extreme.mean],
    ["extreme.stdDev", extreme.stdDev],
    ["extreme.threshold", extreme.threshold],
    ["extreme.exceedanceCount", extreme.exceedanceCount],
    ["extreme.exceedanceProbability", extreme.exceedanceProbability],
    ["extreme.theoreticalExceedanceProbability", extreme.theoreticalExceedanceProbability],
    ["extreme.min", extreme.min],
    ["extreme.max", extreme.max],
    ...parameterEntries(distribution.parameters).map(
      ([k, v]): [string, number] => [`distribution.${k}`, v]
    ),
    ...distribution.percentiles.map(
      (p): [string, number] => [`distribution.p${Math.round(p.quantile * 100)}`, p.value]
    ),
  ];
}

export function summaryToCsv(result: AnalysisResult): string {
  const lines = ["metric,value"];
  for (const [metric, value] of summaryMetrics(result)) {
    lines.push(`${metric},${value === null ? "" : num(value)}`);
  }
  return lines.join("\n") + "\n";
}

/** Empty cells come back as null. */
export function parseSummaryCsv(text: string): Map<string, number | null> {
  const rows = parse(text, { columns: true, skip_empty_lines: true, trim: true }) as Record<string, string>[];
  const out = new Map<string, number | null>();
  for (const row of rows) {
    const metric = row.metric ?? "";
    const cell = row.value ?? "";
    out.set(metric, cell === "" ? null : toNumber(cell, metric));
  }
  return out;
}
