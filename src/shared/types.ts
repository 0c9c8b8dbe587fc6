/** Weather variables the profile can be computed for */
export type ClimateVariable =
  | "temperature"
  | "precipitation"
  | "wind_speed"
  | "relative_humidity"
  | "solar_radiation";

/** Parametric families the distribution modeler can fit */
export type DistributionFamily = "normal" | "lognormal" | "gamma";

/** Direction label derived from the trend slope */
export type TrendDirection = "increasing" | "decreasing" | "stable";

/** Pipeline stages, used for error context and trace records */
export type PipelineStage =
  | "normalize"
  | "select"
  | "trend"
  | "extremes"
  | "distribution"
  | "aggregate";

/** DTR types */
export type DTRType =
  | "SERIES_NORMALIZATION"
  | "DAY_OF_YEAR_SELECTION"
  | "TREND_REGRESSION"
  | "EXTREME_ESTIMATION"
  | "DISTRIBUTION_FIT"
  | "INSIGHT_AGGREGATION";

// ── Series ─────────────────────────────────────────────────────────

/** One point of a normalized daily series. `value` is null when missing. */
export interface SeriesPoint {
  date: string; // YYYY-MM-DD
  year: number;
  month: number;
  day: number;
  value: number | null;
}

export interface TimeSeries {
  variable: ClimateVariable;
  points: readonly SeriesPoint[];
  validCount: number;
  missingCount: number;
}

// ── Samples ────────────────────────────────────────────────────────

export interface ClimatologicalSample {
  year: number;
  value: number;
  /** Number of in-window daily values averaged into `value`. */
  observations: number;
}

export interface TargetDay {
  month: number;
  day: number;
  windowDays: number;
}

export interface SampleSet {
  variable: ClimateVariable;
  target: TargetDay;
  samples: readonly ClimatologicalSample[];
  /** SHA-256 of variable, target and samples. */
  fingerprint: string;
}

// ── Results ────────────────────────────────────────────────────────

export interface FittedPoint {
  year: number;
  value: number;
}

/** Ordinary least-squares fit of value on year */
export interface TrendResult {
  sampleSetFingerprint: string;
  sampleSize: number;
  slope: number; // units per year
  intercept: number;
  slopePerDecade: number;
  rSquared: number;
  residualStdError: number;
  slopeStdError: number;
  direction: TrendDirection;
  fitted: FittedPoint[];
}

/** μ+2σ extreme-event summary */
export interface ExtremeResult {
  sampleSetFingerprint: string;
  sampleSize: number;
  mean: number;
  stdDev: number; // n − 1 denominator
  threshold: number; // mean + 2 · stdDev
  exceedanceCount: number;
  exceedanceProbability: number;
  theoreticalExceedanceProbability: number | null;
  min: number;
  max: number;
}

export type DistributionParameters =
  | { family: "normal"; mean: number; stdDev: number }
  | { family: "lognormal"; logMean: number; logStdDev: number }
  | { family: "gamma"; shape: number; scale: number };

export interface Percentile {
  quantile: number;
  value: number;
}

export interface UncertaintyBand {
  label: string;
  coverage: number;
  lower: number;
  upper: number;
}

export interface DistributionResult {
  sampleSetFingerprint: string;
  sampleSize: number;
  family: DistributionFamily;
  estimator: "method_of_moments";
  parameters: DistributionParameters;
  percentiles: Percentile[];
  bands: UncertaintyBand[];
}

// ── Query & aggregate ──────────────────────────────────────────────

export interface GeoLocation {
  latitude: number;
  longitude: number;
  label?: string;
}

export interface AnalysisQuery {
  location: GeoLocation;
  variable: ClimateVariable;
  month: number;
  day: number;
  windowDays: number;
}

export interface AnalysisResult {
  readonly query: AnalysisQuery;
  readonly sampleSet: SampleSet;
  readonly trend: TrendResult;
  readonly extreme: ExtremeResult;
  readonly distribution: DistributionResult;
}

// ── Trace ──────────────────────────────────────────────────────────

/** A Decision Trace Record: one hash-chained entry per pipeline stage */
export interface DTRRecord {
  traceId: string;
  caseId: string;
  traceType: DTRType;
  chainPosition: number;
  initiatedAt: string;
  completedAt: string;
  durationMs: number;
  inputLineage: {
    primarySources: Array<{ sourceId: string; sourceHash: string; sourceType: string }>;
  };
  derivedInputs?: Array<{
    formula: string;
    parameters: Record<string, unknown>;
  }>;
  reasoningChain?: {
    steps: Array<{ stepNumber: number; action: string; detail: string }>;
  };
  outputContent?: Record<string, unknown>;
  validationResults?: { pass: boolean; messages: string[] };
  hashChain: {
    contentHash: string;
    previousHash: string | null;
    merkleRoot: string;
  };
}
