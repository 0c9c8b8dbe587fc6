import { contentHash } from "../shared/hash.js";
import { InsufficientDataError, MalformedRecordError } from "../shared/errors.js";
import { isLeapYear, isValidMonthDay, toDayNumber } from "./calendar.js";
import type {
  ClimatologicalSample,
  ClimateVariable,
  SampleSet,
  TargetDay,
  TimeSeries,
} from "../shared/types.js";

export interface SelectOptions {
  /** Minimum number of sampled years. Default 10. */
  minYears?: number;
}

export const MAX_WINDOW_DAYS = 90;

/**
 * Fingerprint identifying a SampleSet by content.
 * Downstream results carry it so the aggregator can check they match.
 */
export function sampleSetFingerprint(
  variable: ClimateVariable,
  target: TargetDay,
  samples: readonly ClimatologicalSample[]
): string {
  return contentHash({ variable, target, samples });
}

/**
 * Anchor day of the target for one year, or null when the target does not
 * exist that year and no window is allowed to stand in for it.
 */
function anchorDayNumber(year: number, month: number, day: number, windowDays: number): number | null {
  if (month === 2 && day === 29 && !isLeapYear(year)) {
    return windowDays > 0 ? toDayNumber({ year, month: 2, day: 28 }) : null;
  }
  return toDayNumber({ year, month, day });
}

/**
 * Build one climatological sample per year for the target calendar day.
 *
 * The window spans `windowDays` days either side of the target and crosses
 * year boundaries (Jan 1 ± 3 reaches back to Dec 29 of the previous year).
 * In-window values are averaged. Years without any valid in-window value are
 * omitted.
 */
export function select(
  series: TimeSeries,
  month: number,
  day: number,
  windowDays: number,
  options: SelectOptions = {}
): SampleSet {
  const minYears = options.minYears ?? 10;

  if (!isValidMonthDay(month, day)) {
    throw new MalformedRecordError("select", `Invalid target day: month ${month}, day ${day}`, {
      month,
      day,
    });
  }
  if (!Number.isInteger(windowDays) || windowDays < 0 || windowDays > MAX_WINDOW_DAYS) {
    throw new MalformedRecordError(
      "select",
      `Window must be an integer between 0 and ${MAX_WINDOW_DAYS} days, got ${windowDays}`,
      { windowDays }
    );
  }

  const valueByDay = new Map<number, number>();
  const years = new Set<number>();
  for (const point of series.points) {
    years.add(point.year);
    if (point.value !== null) {
      valueByDay.set(toDayNumber(point), point.value);
    }
  }

  const samples: ClimatologicalSample[] = [];
  for (const year of [...years].sort((a, b) => a - b)) {
    const anchor = anchorDayNumber(year, month, day, windowDays);
    if (anchor === null) continue;

    let sum = 0;
    let observations = 0;
    for (let offset = -windowDays; offset <= windowDays; offset++) {
      const value = valueByDay.get(anchor + offset);
      if (value === undefined) continue;
      sum += value;
      observations++;
    }
    if (observations === 0) continue;

    samples.push({ year, value: sum / observations, observations });
  }

  const target: TargetDay = { month, day, windowDays };
  if (samples.length < minYears) {
    throw new InsufficientDataError(
      "select",
      `Only ${samples.length} year(s) have data for ${month}/${day} (±${windowDays} days); at least ${minYears} required.`,
      { available: samples.length, required: minYears },
      { variable: series.variable, target }
    );
  }

  return {
    variable: series.variable,
    target,
    samples: Object.freeze(samples),
    fingerprint: sampleSetFingerprint(series.variable, target, samples),
  };
}

/**
 * Build a SampleSet directly from (year, value) pairs, e.g. for data already
 * reduced elsewhere. Years must be strictly increasing.
 */
export function createSampleSet(
  variable: ClimateVariable,
  target: TargetDay,
  entries: ReadonlyArray<{ year: number; value: number; observations?: number }>
): SampleSet {
  const samples: ClimatologicalSample[] = entries.map((e) => ({
    year: e.year,
    value: e.value,
    observations: e.observations ?? 1,
  }));
  for (let i = 0; i < samples.length; i++) {
    const s = samples[i];
    if (!Number.isInteger(s.year) || !Number.isFinite(s.value)) {
      throw new MalformedRecordError("select", `Sample ${i} has a non-integer year or non-finite value`, {
        index: i,
        sample: s,
      });
    }
    if (i > 0 && s.year <= samples[i - 1].year) {
      throw new MalformedRecordError("select", `Sample years must be strictly increasing (index ${i})`, {
        index: i,
        year: s.year,
        previousYear: samples[i - 1].year,
      });
    }
  }
  return {
    variable,
    target,
    samples: Object.freeze(samples),
    fingerprint: sampleSetFingerprint(variable, target, samples),
  };
}
