/**
 * Series Normalizer — turns the raw daily record stream handed over by the
 * data-fetch collaborator into a uniform, date-ordered TimeSeries.
 *
 * Handles: schema validation, date parsing, sentinel detection,
 * duplicate collapsing and sorting.
 */

import { parseCalendarDate, formatCalendarDate } from "./calendar.js";
import { RawRecordSchema, type ClassifiedRecord } from "./schemas.js";
import { InsufficientDataError, MalformedRecordError } from "../shared/errors.js";
import type { ClimateVariable, SeriesPoint, TimeSeries } from "../shared/types.js";

export interface NormalizeOptions {
  variable: ClimateVariable;
  /** Minimum number of valid (non-missing) points. Default 10. */
  minValidPoints?: number;
}

// ── Classification ───────────────────────────────────────────────────

export function classifyRecord(
  raw: unknown,
  index: number,
  missingSentinel: number,
  variable: ClimateVariable
): ClassifiedRecord {
  const parsed = RawRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      kind: "malformed",
      index,
      issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(record)"}: ${i.message}`),
    };
  }

  const record = parsed.data;
  const issues: string[] = [];

  const date = parseCalendarDate(record.date);
  if (!date) issues.push(`date: cannot parse "${record.date}"`);
  if (record.variable !== undefined && record.variable !== variable) {
    issues.push(`variable: expected "${variable}", got "${record.variable}"`);
  }
  if (record.value !== null && !Number.isNaN(record.value) && !Number.isFinite(record.value)) {
    issues.push(`value: ${record.value} is not finite`);
  }
  if (!date || issues.length > 0) {
    return { kind: "malformed", index, issues };
  }

  const isoDate = formatCalendarDate(date);
  const value = record.value;
  if (value === null || Number.isNaN(value) || value === missingSentinel) {
    return { kind: "missing", index, date: isoDate };
  }
  return { kind: "valid", index, date: isoDate, value };
}

// ── Main Normalization ───────────────────────────────────────────────

/**
 * Normalize raw records into a TimeSeries.
 *
 * Missing values are kept as `value: null`. Duplicate dates collapse when
 * they agree and are rejected when they conflict.
 *
 * @throws MalformedRecordError on any unparsable record or conflicting duplicate
 * @throws InsufficientDataError when fewer than `minValidPoints` valid values remain
 */
export function normalize(
  records: readonly unknown[],
  missingSentinel: number,
  options: NormalizeOptions
): TimeSeries {
  const minValidPoints = options.minValidPoints ?? 10;
  const classified = records.map((r, i) =>
    classifyRecord(r, i, missingSentinel, options.variable)
  );

  const malformed = classified.filter(
    (c): c is Extract<ClassifiedRecord, { kind: "malformed" }> => c.kind === "malformed"
  );
  if (malformed.length > 0) {
    const first = malformed[0];
    throw new MalformedRecordError(
      "normalize",
      `Record ${first.index} is malformed: ${first.issues.join("; ")}`,
      { index: first.index, issues: first.issues, malformedCount: malformed.length }
    );
  }

  const byDate = new Map<string, number | null>();
  for (const c of classified) {
    if (c.kind === "malformed") continue;
    const value = c.kind === "valid" ? c.value : null;
    if (byDate.has(c.date)) {
      const existing = byDate.get(c.date);
      if (existing !== value) {
        throw new MalformedRecordError(
          "normalize",
          `Date ${c.date} is duplicated with conflicting values (${existing} vs ${value})`,
          { date: c.date, index: c.index, values: [existing, value] }
        );
      }
      continue;
    }
    byDate.set(c.date, value);
  }

  // ISO dates sort chronologically as strings
  const points: SeriesPoint[] = [...byDate.keys()].sort().map((date) => {
    const [year, month, day] = date.split("-").map(Number);
    return { date, year, month, day, value: byDate.get(date) ?? null };
  });

  const validCount = points.filter((p) => p.value !== null).length;
  if (validCount < minValidPoints) {
    throw new InsufficientDataError(
      "normalize",
      `Only ${validCount} valid daily values after removing missing data; at least ${minValidPoints} required.`,
      { available: validCount, required: minValidPoints },
      { variable: options.variable, missingSentinel, totalRecords: records.length }
    );
  }

  return {
    variable: options.variable,
    points: Object.freeze(points),
    validCount,
    missingCount: points.length - validCount,
  };
}
