import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { DEFAULT_QUANTILES, resolveAnalysisConfig } from "../src/shared/run_config.js";

describe("resolveAnalysisConfig", () => {
  it("falls back to defaults", () => {
    expect(resolveAnalysisConfig({}, {})).toEqual({
      minYears: 10,
      minValidPoints: 10,
      windowDays: 0,
      missingSentinel: -999,
      quantiles: [...DEFAULT_QUANTILES],
      volatilityThreshold: 0.15,
    });
  });

  it("reads the environment and lets overrides win", () => {
    const env = {
      CLIMATOLOGY_MIN_YEARS: "25",
      CLIMATOLOGY_WINDOW_DAYS: "3",
      CLIMATOLOGY_MISSING_SENTINEL: "-9999",
      CLIMATOLOGY_MIN_POINTS: " ",
    };
    const config = resolveAnalysisConfig({ windowDays: 7, minYears: undefined }, env);
    expect(config.minYears).toBe(25);
    expect(config.windowDays).toBe(7);
    expect(config.missingSentinel).toBe(-9999);
    expect(config.minValidPoints).toBe(10);
  });

  it("rejects non-numeric environment values", () => {
    expect(() => resolveAnalysisConfig({}, { CLIMATOLOGY_MIN_YEARS: "ten" })).toThrow(
      'Invalid numeric value for CLIMATOLOGY_MIN_YEARS: "ten"'
    );
  });

  it("rejects out-of-range values", () => {
    expect(() => resolveAnalysisConfig({ windowDays: 120 }, {})).toThrow(ZodError);
    expect(() => resolveAnalysisConfig({ minYears: 1 }, {})).toThrow(ZodError);
    expect(() => resolveAnalysisConfig({ quantiles: [0, 0.5] }, {})).toThrow(ZodError);
  });
});
