import { describe, it, expect } from "vitest";
import { aggregate } from "../src/analytics/insight.js";
import { fitTrend } from "../src/analytics/trend.js";
import { fitDistribution } from "../src/analytics/distribution.js";
import { estimateExtremes } from "../src/analytics/extremes.js";
import { createSampleSet } from "../src/series/selector.js";
import { InconsistentResultError } from "../src/shared/errors.js";
import type { AnalysisQuery, SampleSet } from "../src/shared/types.js";

const query: AnalysisQuery = {
  location: { latitude: 40.7, longitude: -74, label: "Testville" },
  variable: "temperature",
  month: 3,
  day: 15,
  windowDays: 0,
};

function stages(sampleSet: SampleSet) {
  const distribution = fitDistribution(sampleSet);
  return {
    trend: fitTrend(sampleSet),
    distribution,
    extreme: estimateExtremes(sampleSet, { distribution }),
  };
}

const sampleSet = createSampleSet(
  "temperature",
  { month: 3, day: 15, windowDays: 0 },
  [4, 6, 5, 8, 7, 9].map((value, i) => ({ year: 2010 + i, value }))
);

describe("Insight aggregation", () => {
  it("packages consistent results into a frozen AnalysisResult", () => {
    const { trend, extreme, distribution } = stages(sampleSet);
    const result = aggregate(query, sampleSet, trend, extreme, distribution);

    expect(result.sampleSet).toBe(sampleSet);
    expect(result.trend).toBe(trend);
    expect(result.query).toEqual(query);
    expect(result.query).not.toBe(query);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.trend.fitted)).toBe(true);
    expect(Object.isFrozen(result.query.location)).toBe(true);
  });

  it("rejects results from a different SampleSet", () => {
    const other = createSampleSet("temperature", sampleSet.target, [
      { year: 2010, value: 1 },
      { year: 2011, value: 3 },
      { year: 2012, value: 2 },
    ]);
    const { extreme, distribution } = stages(sampleSet);
    try {
      aggregate(query, sampleSet, fitTrend(other), extreme, distribution);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InconsistentResultError);
      if (err instanceof InconsistentResultError) {
        expect(err.stage).toBe("aggregate");
        expect(err.message).toContain("trend");
      }
    }
  });

  it("rejects a SampleSet edited after its fingerprint was taken", () => {
    const { trend, extreme, distribution } = stages(sampleSet);
    const edited: SampleSet = {
      ...sampleSet,
      samples: sampleSet.samples.map((s) => (s.year === 2012 ? { ...s, value: 50 } : s)),
    };
    expect(() => aggregate(query, edited, trend, extreme, distribution)).toThrow(
      InconsistentResultError
    );
  });

  it("rejects a query that does not describe the SampleSet", () => {
    const { trend, extreme, distribution } = stages(sampleSet);
    expect(() =>
      aggregate({ ...query, day: 16 }, sampleSet, trend, extreme, distribution)
    ).toThrow(/differs in: day/);
    expect(() =>
      aggregate({ ...query, variable: "precipitation" }, sampleSet, trend, extreme, distribution)
    ).toThrow(InconsistentResultError);
  });
});
