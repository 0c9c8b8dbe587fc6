/**
 * Error hierarchy for the climatology pipeline.
 *
 * Every failure is a deterministic function of the input data, so nothing
 * here is retried. Each error carries the stage that raised it and a context
 * object; the pipeline attaches the originating query before rethrowing.
 */

import type { AnalysisQuery, PipelineStage } from "./types.js";

export enum ErrorCode {
  MALFORMED_RECORD = "MALFORMED_RECORD",
  INSUFFICIENT_DATA = "INSUFFICIENT_DATA",
  DEGENERATE_FIT = "DEGENERATE_FIT",
  DISTRIBUTION_FIT = "DISTRIBUTION_FIT",
  INCONSISTENT_RESULT = "INCONSISTENT_RESULT",
}

export type ErrorContext = Record<string, unknown>;

export class ClimatologyError extends Error {
  readonly code: ErrorCode;
  readonly stage: PipelineStage;
  private readonly details: ErrorContext;
  private attachedQuery?: AnalysisQuery;

  constructor(code: ErrorCode, stage: PipelineStage, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = "ClimatologyError";
    this.code = code;
    this.stage = stage;
    this.details = { ...context };
  }

  /** Query that was being answered when the error surfaced, if known. */
  get query(): AnalysisQuery | undefined {
    return this.attachedQuery;
  }

  get context(): ErrorContext {
    return this.attachedQuery
      ? { ...this.details, query: this.attachedQuery }
      : { ...this.details };
  }

  attachQuery(query: AnalysisQuery): this {
    this.attachedQuery = query;
    return this;
  }

  toString(): string {
    return `${this.name} [${this.code}] at ${this.stage}: ${this.message} Context: ${JSON.stringify(this.context)}`;
  }
}

/** Unparsable, impossible or conflicting input data. */
export class MalformedRecordError extends ClimatologyError {
  constructor(stage: PipelineStage, message: string, context?: ErrorContext) {
    super(ErrorCode.MALFORMED_RECORD, stage, message, context);
    this.name = "MalformedRecordError";
  }
}

/** Too few valid points or years for the statistic to mean anything. */
export class InsufficientDataError extends ClimatologyError {
  readonly available: number;
  readonly required: number;

  constructor(
    stage: PipelineStage,
    message: string,
    counts: { available: number; required: number },
    context?: ErrorContext
  ) {
    super(ErrorCode.INSUFFICIENT_DATA, stage, message, { ...context, ...counts });
    this.name = "InsufficientDataError";
    this.available = counts.available;
    this.required = counts.required;
  }
}

/** Zero variance, or fewer than two distinct regressor values. */
export class DegenerateFitError extends ClimatologyError {
  constructor(stage: PipelineStage, message: string, context?: ErrorContext) {
    super(ErrorCode.DEGENERATE_FIT, stage, message, context);
    this.name = "DegenerateFitError";
  }
}

/** The requested family cannot describe the data. */
export class DistributionFitError extends ClimatologyError {
  readonly suggestion: string;

  constructor(message: string, suggestion: string, context?: ErrorContext) {
    super(ErrorCode.DISTRIBUTION_FIT, "distribution", message, { ...context, suggestion });
    this.name = "DistributionFitError";
    this.suggestion = suggestion;
  }
}

/** Results that do not derive from the same SampleSet. Indicates a caller bug. */
export class InconsistentResultError extends ClimatologyError {
  constructor(stage: PipelineStage, message: string, context?: ErrorContext) {
    super(ErrorCode.INCONSISTENT_RESULT, stage, message, context);
    this.name = "InconsistentResultError";
  }
}
