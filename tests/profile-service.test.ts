import { describe, it, expect, vi } from "vitest";
import { ProfileService } from "../src/pipeline/profile_service.js";
import { InMemorySeriesCache, seriesCacheKey } from "../src/cache/series_cache.js";
import { rampRecords } from "./helpers/synthetic.js";
import type { FetchedSeries } from "../src/cache/series_cache.js";
import type { AnalysisQuery } from "../src/shared/types.js";

const query: AnalysisQuery = {
  location: { latitude: 51.5, longitude: -0.12, label: "Testville" },
  variable: "temperature",
  month: 3,
  day: 15,
  windowDays: 2,
};

const fetched: FetchedSeries = {
  records: rampRecords(2000, 2019),
  missingSentinel: -999,
  sourceId: "power:T2M",
};

describe("ProfileService", () => {
  it("fetches once and serves repeat queries from the cache", async () => {
    const fetchSeries = vi.fn(async () => fetched);
    const cache = new InMemorySeriesCache();
    const service = new ProfileService({ fetchSeries, cache, startYear: 2000, endYear: 2019 });

    const first = await service.profile(query, { env: {} });
    const second = await service.profile({ ...query, day: 20 }, { env: {} });

    expect(fetchSeries).toHaveBeenCalledTimes(1);
    expect(fetchSeries).toHaveBeenCalledWith({
      location: query.location,
      variable: "temperature",
      startYear: 2000,
      endYear: 2019,
    });
    expect(cache.size).toBe(1);
    expect(first.result.sampleSet.samples).toHaveLength(20);
    expect(second.result.query.day).toBe(20);
    expect(first.trace.getChain()[0].inputLineage.primarySources[0].sourceId).toBe("power:T2M");
  });

  it("fetches again after the entry is invalidated", async () => {
    const fetchSeries = vi.fn(async () => fetched);
    const cache = new InMemorySeriesCache();
    const service = new ProfileService({ fetchSeries, cache, startYear: 2000, endYear: 2019 });

    await service.loadSeries(query);
    expect(cache.invalidate(service.cacheKeyFor(query))).toBe(true);
    await service.loadSeries(query);
    expect(fetchSeries).toHaveBeenCalledTimes(2);
  });

  it("fetches every time without a cache", async () => {
    const fetchSeries = vi.fn(async () => fetched);
    const service = new ProfileService({ fetchSeries, startYear: 2000, endYear: 2019 });
    await service.loadSeries(query);
    await service.loadSeries(query);
    expect(fetchSeries).toHaveBeenCalledTimes(2);
  });

  it("propagates fetch failures without caching them", async () => {
    const fetchSeries = vi.fn(async (): Promise<FetchedSeries> => {
      throw new Error("upstream unavailable");
    });
    const cache = new InMemorySeriesCache();
    const service = new ProfileService({ fetchSeries, cache, startYear: 2000, endYear: 2019 });
    await expect(service.profile(query)).rejects.toThrow("upstream unavailable");
    expect(cache.size).toBe(0);
  });

  it("rejects an inverted year range", () => {
    expect(
      () => new ProfileService({ fetchSeries: async () => fetched, startYear: 2020, endYear: 2000 })
    ).toThrow("Invalid year range: 2020-2000");
  });
});

describe("seriesCacheKey", () => {
  it("rounds coordinates to four decimals", () => {
    const base = { variable: "precipitation" as const, startYear: 1990, endYear: 2020 };
    expect(seriesCacheKey({ ...base, latitude: 10.00001, longitude: -20 })).toBe(
      "10.0000,-20.0000::precipitation::1990-2020"
    );
    expect(seriesCacheKey({ ...base, latitude: 10.00001, longitude: -20 })).toBe(
      seriesCacheKey({ ...base, latitude: 10.00003, longitude: -20.00002 })
    );
  });
});
