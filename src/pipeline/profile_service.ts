import { analyzeDay, type AnalyzeDayOptions, type AnalyzeDayOutput } from "./analyze_day.js";
import type { FetchedSeries, SeriesCache, SeriesCacheKey } from "../cache/series_cache.js";
import type { AnalysisQuery, ClimateVariable, GeoLocation } from "../shared/types.js";

/** Data-fetch collaborator: returns the raw daily series for a location. */
export type SeriesFetcher = (request: {
  location: GeoLocation;
  variable: ClimateVariable;
  startYear: number;
  endYear: number;
}) => Promise<FetchedSeries>;

export interface ProfileServiceDeps {
  fetchSeries: SeriesFetcher;
  cache?: SeriesCache;
  startYear: number;
  endYear: number;
}

/**
 * Application-shell entry point: fetch (or reuse) the raw series for the
 * query's location and variable, then run the synchronous pipeline on it.
 * Holds no state of its own beyond the injected cache.
 */
export class ProfileService {
  private deps: ProfileServiceDeps;

  constructor(deps: ProfileServiceDeps) {
    if (deps.endYear < deps.startYear) {
      throw new Error(`Invalid year range: ${deps.startYear}-${deps.endYear}`);
    }
    this.deps = deps;
  }

  cacheKeyFor(query: AnalysisQuery): SeriesCacheKey {
    return {
      latitude: query.location.latitude,
      longitude: query.location.longitude,
      variable: query.variable,
      startYear: this.deps.startYear,
      endYear: this.deps.endYear,
    };
  }

  async loadSeries(query: AnalysisQuery): Promise<FetchedSeries> {
    const { cache, fetchSeries, startYear, endYear } = this.deps;
    const key = this.cacheKeyFor(query);
    const cached = cache?.get(key);
    if (cached) return cached;

    const fetched = await fetchSeries({
      location: query.location,
      variable: query.variable,
      startYear,
      endYear,
    });
    cache?.set(key, fetched);
    return fetched;
  }

  async profile(
    query: AnalysisQuery,
    options: Omit<AnalyzeDayOptions, "missingSentinel" | "sourceId"> = {}
  ): Promise<AnalyzeDayOutput> {
    const fetched = await this.loadSeries(query);
    return analyzeDay(query, fetched.records, {
      ...options,
      missingSentinel: fetched.missingSentinel,
      sourceId: fetched.sourceId,
    });
  }
}
