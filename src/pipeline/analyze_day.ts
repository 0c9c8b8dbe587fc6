/**
 * Day Profile Pipeline
 *
 * Runs the analytical core for one query:
 * 1. Normalize raw records into a TimeSeries
 * 2. Select one sample per year around the target day
 * 3. Fit the trend
 * 4. Fit the distribution
 * 5. Estimate extremes (with the theoretical estimate from step 4)
 * 6. Aggregate into an AnalysisResult
 *
 * Each stage is recorded in the DTR chain. A failing stage is recorded too,
 * then its error is rethrown with the query attached.
 */

import { v4 as uuidv4 } from "uuid";
import { normalize } from "../series/normalizer.js";
import { select } from "../series/selector.js";
import { AnalysisQuerySchema } from "../series/schemas.js";
import { fitTrend } from "../analytics/trend.js";
import { fitDistribution } from "../analytics/distribution.js";
import { estimateExtremes } from "../analytics/extremes.js";
import { aggregate } from "../analytics/insight.js";
import { DTRRecorder, type DTRInput } from "../trace/dtr.js";
import { ClimatologyError, MalformedRecordError } from "../shared/errors.js";
import { contentHash } from "../shared/hash.js";
import { resolveAnalysisConfig } from "../shared/run_config.js";
import type { AnalysisConfig, AnalysisConfigInput } from "../shared/run_config.js";
import type { AnalysisQuery, AnalysisResult, DTRType } from "../shared/types.js";

export interface AnalyzeDayOptions {
  /** Overrides for thresholds; the rest comes from the environment or defaults. */
  config?: AnalysisConfigInput;
  env?: Record<string, string | undefined>;
  /** Distribution family; defaults per variable. */
  family?: string;
  /** Sentinel reported by the data source; takes priority over the config. */
  missingSentinel?: number;
  /** Identifier of the raw input for lineage (e.g. a file name). */
  sourceId?: string;
  recorder?: DTRRecorder;
}

export interface AnalyzeDayOutput {
  result: AnalysisResult;
  trace: DTRRecorder;
  config: AnalysisConfig;
}

type Lineage = DTRInput["inputLineage"]["primarySources"];
type StageDetails = Pick<DTRInput, "derivedInputs" | "reasoningChain" | "outputContent">;

function runStage<T>(
  recorder: DTRRecorder,
  traceType: DTRType,
  sources: Lineage,
  fn: () => T,
  describe: (out: T) => StageDetails
): T {
  const initiatedAt = new Date();
  let out: T;
  try {
    out = fn();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    recorder.record({
      traceType,
      initiatedAt,
      completedAt: new Date(),
      inputLineage: { primarySources: sources },
      outputContent: err instanceof ClimatologyError ? { errorCode: err.code, stage: err.stage } : {},
      validationResults: { pass: false, messages: [message] },
    });
    throw err;
  }
  recorder.record({
    traceType,
    initiatedAt,
    completedAt: new Date(),
    inputLineage: { primarySources: sources },
    ...describe(out),
    validationResults: { pass: true, messages: [] },
  });
  return out;
}

/**
 * Analyse one calendar day for one location and variable.
 *
 * @throws ClimatologyError subclasses, with `query` attached
 */
export function analyzeDay(
  query: AnalysisQuery,
  records: readonly unknown[],
  options: AnalyzeDayOptions = {}
): AnalyzeDayOutput {
  const parsedQuery = AnalysisQuerySchema.safeParse(query);
  if (!parsedQuery.success) {
    throw new MalformedRecordError(
      "select",
      `Invalid analysis query: ${parsedQuery.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      { issues: parsedQuery.error.issues.map((i) => i.message) }
    ).attachQuery(query);
  }

  const config = resolveAnalysisConfig(options.config, options.env);
  const recorder = options.recorder ?? new DTRRecorder(uuidv4());
  const missingSentinel = options.missingSentinel ?? config.missingSentinel;

  try {
    const series = runStage(
      recorder,
      "SERIES_NORMALIZATION",
      [
        {
          sourceId: options.sourceId ?? "raw-records",
          sourceHash: contentHash(records),
          sourceType: query.variable,
        },
      ],
      () =>
        normalize(records, missingSentinel, {
          variable: query.variable,
          minValidPoints: config.minValidPoints,
        }),
      (ts) => ({
        derivedInputs: [
          {
            formula: "SENTINEL_FILTER_AND_SORT",
            parameters: { missingSentinel, minValidPoints: config.minValidPoints },
          },
        ],
        outputContent: {
          points: ts.points.length,
          validCount: ts.validCount,
          missingCount: ts.missingCount,
          firstDate: ts.points[0]?.date,
          lastDate: ts.points[ts.points.length - 1]?.date,
        },
      })
    );

    const seriesSource = {
      sourceId: `series:${query.variable}`,
      sourceHash: contentHash(series.points),
      sourceType: "time_series",
    };
    const sampleSet = runStage(
      recorder,
      "DAY_OF_YEAR_SELECTION",
      [seriesSource],
      () =>
        select(series, query.month, query.day, query.windowDays, { minYears: config.minYears }),
      (ss) => ({
        derivedInputs: [
          {
            formula: "WINDOW_MEAN_PER_YEAR",
            parameters: { ...ss.target, minYears: config.minYears },
          },
        ],
        reasoningChain: {
          steps: [
            {
              stepNumber: 1,
              action: "collect",
              detail: `Values within ±${query.windowDays} day(s) of ${query.month}/${query.day} per year`,
            },
            { stepNumber: 2, action: "reduce", detail: "Arithmetic mean of in-window values" },
            { stepNumber: 3, action: "omit", detail: "Years without any valid in-window value" },
          ],
        },
        outputContent: {
          fingerprint: ss.fingerprint,
          years: ss.samples.length,
          firstYear: ss.samples[0]?.year,
          lastYear: ss.samples[ss.samples.length - 1]?.year,
        },
      })
    );

    const sampleSource = [
      { sourceId: sampleSet.fingerprint, sourceHash: sampleSet.fingerprint, sourceType: "sample_set" },
    ];

    const trend = runStage(recorder, "TREND_REGRESSION", sampleSource, () => fitTrend(sampleSet), (t) => ({
      derivedInputs: [{ formula: "OLS_VALUE_ON_YEAR", parameters: { n: t.sampleSize } }],
      outputContent: {
        slope: t.slope,
        intercept: t.intercept,
        rSquared: t.rSquared,
        direction: t.direction,
      },
    }));

    const distribution = runStage(
      recorder,
      "DISTRIBUTION_FIT",
      sampleSource,
      () => fitDistribution(sampleSet, options.family, { quantiles: config.quantiles }),
      (d) => ({
        derivedInputs: [
          { formula: "METHOD_OF_MOMENTS", parameters: { family: d.family, quantiles: config.quantiles } },
        ],
        outputContent: { parameters: d.parameters, percentiles: d.percentiles },
      })
    );

    const extreme = runStage(
      recorder,
      "EXTREME_ESTIMATION",
      sampleSource,
      () => estimateExtremes(sampleSet, { distribution }),
      (e) => ({
        derivedInputs: [{ formula: "MEAN_PLUS_2_SIGMA_N_MINUS_1", parameters: { n: e.sampleSize } }],
        outputContent: {
          mean: e.mean,
          stdDev: e.stdDev,
          threshold: e.threshold,
          exceedanceProbability: e.exceedanceProbability,
          theoreticalExceedanceProbability: e.theoreticalExceedanceProbability,
        },
      })
    );

    const result = runStage(
      recorder,
      "INSIGHT_AGGREGATION",
      sampleSource,
      () => aggregate(query, sampleSet, trend, extreme, distribution),
      () => ({ outputContent: { fingerprint: sampleSet.fingerprint } })
    );

    return { result, trace: recorder, config };
  } catch (err) {
    if (err instanceof ClimatologyError) {
      err.attachQuery(query);
    }
    throw err;
  }
}
