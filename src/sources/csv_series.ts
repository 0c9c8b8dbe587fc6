import { parse } from "csv-parse/sync";
import type { FetchedSeries } from "../cache/series_cache.js";

export interface CsvSeriesOptions {
  dateColumn?: string;
  valueColumn?: string;
  missingSentinel?: number;
  sourceId?: string;
}

/**
 * Read a daily series from CSV text with a header row.
 *
 * Empty cells become `null` (missing). Non-numeric cells are passed through
 * as text so the normalizer rejects them instead of guessing.
 */
export function parseSeriesCsv(text: string, options: CsvSeriesOptions = {}): FetchedSeries {
  const dateColumn = options.dateColumn ?? "date";
  const valueColumn = options.valueColumn ?? "value";

  const rows = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  }) as Record<string, string>[];

  if (rows.length > 0) {
    const headers = Object.keys(rows[0]);
    for (const col of [dateColumn, valueColumn]) {
      if (!headers.includes(col)) {
        throw new Error(`CSV is missing column "${col}" (found: ${headers.join(", ")})`);
      }
    }
  }

  const records = rows.map((row) => {
    const cell = row[valueColumn] ?? "";
    const numeric = Number(cell);
    let value: number | string | null;
    if (cell === "") value = null;
    else if (Number.isNaN(numeric)) value = cell;
    else value = numeric;
    return { date: row[dateColumn] ?? "", value };
  });

  return {
    records,
    missingSentinel: options.missingSentinel ?? -999,
    sourceId: options.sourceId ?? "csv",
  };
}
