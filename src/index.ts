export * from "./shared/types.js";
export * from "./shared/errors.js";
export { resolveAnalysisConfig, AnalysisConfigSchema, DEFAULT_QUANTILES } from "./shared/run_config.js";
export type { AnalysisConfig, AnalysisConfigInput } from "./shared/run_config.js";

export { normalize, classifyRecord } from "./series/normalizer.js";
export type { NormalizeOptions } from "./series/normalizer.js";
export { select, createSampleSet, sampleSetFingerprint, MAX_WINDOW_DAYS } from "./series/selector.js";
export type { SelectOptions } from "./series/selector.js";
export { RawRecordSchema, AnalysisQuerySchema } from "./series/schemas.js";
export type { RawRecord, ClassifiedRecord } from "./series/schemas.js";

export { fitTrend } from "./analytics/trend.js";
export { estimateExtremes, EXTREME_SIGMA } from "./analytics/extremes.js";
export type { EstimateExtremesOptions } from "./analytics/extremes.js";
export { fitDistribution, cdf, pdf, quantile, moments, DISTRIBUTION_FAMILIES } from "./analytics/distribution.js";
export type { FitDistributionOptions } from "./analytics/distribution.js";
export { aggregate } from "./analytics/insight.js";

export { analyzeDay } from "./pipeline/analyze_day.js";
export type { AnalyzeDayOptions, AnalyzeDayOutput } from "./pipeline/analyze_day.js";
export { ProfileService } from "./pipeline/profile_service.js";
export type { SeriesFetcher, ProfileServiceDeps } from "./pipeline/profile_service.js";
export { InMemorySeriesCache, seriesCacheKey } from "./cache/series_cache.js";
export type { SeriesCache, SeriesCacheKey, FetchedSeries } from "./cache/series_cache.js";

export { VARIABLE_CATALOG, CLIMATE_VARIABLES, getVariableInfo, variableFromPowerCode } from "./sources/variables.js";
export type { VariableInfo } from "./sources/variables.js";
export { parsePowerDailyResponse, powerResponseLocation } from "./sources/power.js";
export { parseSeriesCsv } from "./sources/csv_series.js";

export { DTRRecorder, validateChain } from "./trace/dtr.js";
export { exportJSONL, parseJSONL, generateAuditSummaryMd } from "./trace/exporters.js";

export { buildInsightNarrative } from "./exports/narrative.js";
export type { InsightNarrative } from "./exports/narrative.js";
export { samplesToCsv, parseSamplesCsv, summaryToCsv, parseSummaryCsv, summaryMetrics } from "./exports/csv.js";
export { serializeAnalysis, deserializeAnalysis } from "./exports/json.js";
export { buildTrendChart, buildDistributionChart, densityCurve, renderQuickChart } from "./exports/chart.js";
export type { ChartSpec, ChartRenderer } from "./exports/chart.js";
export { createExportBundle, buildExportFiles, renderChartImages } from "./exports/bundle.js";
export type { BundleFile, ExportBundleOptions } from "./exports/bundle.js";
