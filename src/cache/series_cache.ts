/**
 * SeriesCache
 *
 * Explicit cache of fetched raw series, keyed by location, variable and year
 * range. Entries live until the owner calls `invalidate` or `clear`; there is
 * no process-wide instance.
 */

import type { ClimateVariable } from "../shared/types.js";

export interface SeriesCacheKey {
  latitude: number;
  longitude: number;
  variable: ClimateVariable;
  startYear: number;
  endYear: number;
}

/** Raw payload as returned by a SeriesFetcher. */
export interface FetchedSeries {
  records: unknown[];
  missingSentinel: number;
  /** Identifier of the upstream source, kept for trace lineage. */
  sourceId?: string;
}

export interface SeriesCache {
  get(key: SeriesCacheKey): FetchedSeries | undefined;
  set(key: SeriesCacheKey, value: FetchedSeries): void;
  has(key: SeriesCacheKey): boolean;
  invalidate(key: SeriesCacheKey): boolean;
  clear(): void;
  readonly size: number;
}

/** Coordinates are fixed to 4 decimals (~11 m) so float noise does not split entries. */
export function seriesCacheKey(key: SeriesCacheKey): string {
  return `${key.latitude.toFixed(4)},${key.longitude.toFixed(4)}::${key.variable}::${key.startYear}-${key.endYear}`;
}

export class InMemorySeriesCache implements SeriesCache {
  private data = new Map<string, FetchedSeries>();

  get(key: SeriesCacheKey): FetchedSeries | undefined {
    return this.data.get(seriesCacheKey(key));
  }

  set(key: SeriesCacheKey, value: FetchedSeries): void {
    this.data.set(seriesCacheKey(key), value);
  }

  has(key: SeriesCacheKey): boolean {
    return this.data.has(seriesCacheKey(key));
  }

  invalidate(key: SeriesCacheKey): boolean {
    return this.data.delete(seriesCacheKey(key));
  }

  clear(): void {
    this.data.clear();
  }

  get size(): number {
    return this.data.size;
  }
}
