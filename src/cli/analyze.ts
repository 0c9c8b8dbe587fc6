#!/usr/bin/env tsx
/**
 * CLI: analyze
 *
 * Usage: npm run analyze -- --input <file> --date <MM-DD> [options]
 *
 * Profiles one calendar day from a local NASA POWER daily JSON payload or a
 * `date,value` CSV file, prints the insight and optionally writes the export
 * bundle.
 */

import { readFileSync, writeFileSync } from "fs";
import path from "path";
import { parseAnalyzeArgs, USAGE } from "./args.js";
import { analyzeDay } from "../pipeline/analyze_day.js";
import { parsePowerDailyResponse, powerResponseLocation } from "../sources/power.js";
import { parseSeriesCsv } from "../sources/csv_series.js";
import { buildInsightNarrative } from "../exports/narrative.js";
import { createExportBundle } from "../exports/bundle.js";
import { renderQuickChart } from "../exports/chart.js";
import { resolveAnalysisConfig } from "../shared/run_config.js";
import { ClimatologyError, DistributionFitError } from "../shared/errors.js";
import { sha256Bytes } from "../shared/hash.js";
import type { FetchedSeries } from "../cache/series_cache.js";
import type { AnalysisQuery } from "../shared/types.js";

async function main(): Promise<void> {
  const args = parseAnalyzeArgs(process.argv.slice(2));
  const inputPath = path.resolve(args.input);
  const buffer = readFileSync(inputPath);
  const text = buffer.toString("utf-8");

  let fetched: FetchedSeries;
  let location = { latitude: args.latitude, longitude: args.longitude };
  if (inputPath.toLowerCase().endsWith(".csv")) {
    fetched = parseSeriesCsv(text, { sourceId: path.basename(inputPath) });
  } else {
    const json: unknown = JSON.parse(text);
    fetched = parsePowerDailyResponse(json, args.variable);
    const fromPayload = powerResponseLocation(json);
    location = {
      latitude: args.latitude ?? fromPayload?.latitude,
      longitude: args.longitude ?? fromPayload?.longitude,
    };
  }

  if (location.latitude === undefined || location.longitude === undefined) {
    throw new Error("Location unknown: pass --lat and --lon");
  }

  const config = resolveAnalysisConfig({ windowDays: args.windowDays, minYears: args.minYears });
  const query: AnalysisQuery = {
    location: { latitude: location.latitude, longitude: location.longitude, label: args.label },
    variable: args.variable,
    month: args.month,
    day: args.day,
    windowDays: config.windowDays,
  };

  console.log(`  Input:     ${inputPath}`);
  console.log(`  SHA-256:   ${sha256Bytes(buffer)}`);
  console.log(`  Records:   ${fetched.records.length}`);
  console.log();

  const { result, trace } = analyzeDay(query, fetched.records, {
    config: { minYears: args.minYears, windowDays: args.windowDays },
    family: args.family,
    missingSentinel: fetched.missingSentinel,
    sourceId: fetched.sourceId ?? path.basename(inputPath),
  });

  const narrative = buildInsightNarrative(result, {
    volatilityThreshold: config.volatilityThreshold,
  });
  console.log(narrative.fullText);
  console.log();

  const integrity = trace.validateChain();
  console.log(`  Trace:     ${trace.length} stage(s), chain ${integrity.valid ? "valid" : "INVALID"}`);

  if (args.out) {
    const zip = await createExportBundle(result, trace.getChain(), {
      volatilityThreshold: config.volatilityThreshold,
      renderChart: renderQuickChart,
    });
    writeFileSync(path.resolve(args.out), zip);
    console.log(`  Bundle:    ${path.resolve(args.out)}`);
  }
}

main().catch((err: unknown) => {
  if (err instanceof ClimatologyError) {
    console.error(`  ✗ ${err.name} at ${err.stage}: ${err.message}`);
    if (err instanceof DistributionFitError) {
      console.error(`    ${err.suggestion}`);
    }
  } else {
    console.error(`  ✗ ${err instanceof Error ? err.message : String(err)}`);
    console.error();
    console.error(USAGE);
  }
  process.exitCode = 1;
});
