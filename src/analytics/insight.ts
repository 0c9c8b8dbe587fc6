import { InconsistentResultError } from "../shared/errors.js";
import { sampleSetFingerprint } from "../series/selector.js";
import type {
  AnalysisQuery,
  AnalysisResult,
  DistributionResult,
  ExtremeResult,
  SampleSet,
  TrendResult,
} from "../shared/types.js";

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Package the stage outputs into one immutable AnalysisResult.
 *
 * No statistics are computed here. Every input must derive from the same
 * SampleSet and the query must describe that SampleSet.
 */
export function aggregate(
  query: AnalysisQuery,
  sampleSet: SampleSet,
  trend: TrendResult,
  extreme: ExtremeResult,
  distribution: DistributionResult
): AnalysisResult {
  const expected = sampleSetFingerprint(sampleSet.variable, sampleSet.target, sampleSet.samples);
  if (expected !== sampleSet.fingerprint) {
    throw new InconsistentResultError(
      "aggregate",
      "SampleSet fingerprint does not match its contents; it was modified after selection.",
      { declared: sampleSet.fingerprint, actual: expected }
    );
  }

  const mismatched = (
    [
      ["trend", trend.sampleSetFingerprint],
      ["extreme", extreme.sampleSetFingerprint],
      ["distribution", distribution.sampleSetFingerprint],
    ] as const
  ).filter(([, fp]) => fp !== sampleSet.fingerprint);
  if (mismatched.length > 0) {
    throw new InconsistentResultError(
      "aggregate",
      `Result(s) derived from a different SampleSet: ${mismatched.map(([name]) => name).join(", ")}`,
      {
        sampleSetFingerprint: sampleSet.fingerprint,
        mismatched: Object.fromEntries(mismatched),
      }
    );
  }

  const { target } = sampleSet;
  const queryFields = {
    variable: [query.variable, sampleSet.variable],
    month: [query.month, target.month],
    day: [query.day, target.day],
    windowDays: [query.windowDays, target.windowDays],
  } as const;
  const differing = Object.entries(queryFields)
    .filter(([, [q, s]]) => q !== s)
    .map(([field]) => field);
  if (differing.length > 0) {
    throw new InconsistentResultError(
      "aggregate",
      `Query does not describe the SampleSet (differs in: ${differing.join(", ")})`,
      { query, target, variable: sampleSet.variable }
    );
  }

  return deepFreeze({
    query: structuredClone(query),
    sampleSet,
    trend,
    extreme,
    distribution,
  });
}
