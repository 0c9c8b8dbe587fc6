import { describe, it, expect } from "vitest";
import { normalize } from "../src/series/normalizer.js";
import { select, createSampleSet } from "../src/series/selector.js";
import { InsufficientDataError, MalformedRecordError } from "../src/shared/errors.js";
import { dailyRecords, noisyTrendRecords, shuffled } from "./helpers/synthetic.js";
import type { RawRecord } from "../src/series/schemas.js";

const norm = (records: RawRecord[]) =>
  normalize(records, -999, { variable: "temperature", minValidPoints: 1 });

/** Mar 10–20 of each year, value = year·100 + day; Mar 15 2005 missing. */
function marchSeries() {
  const records: RawRecord[] = [];
  for (let year = 2000; year <= 2011; year++) {
    records.push(
      ...dailyRecords({ year, month: 3, day: 10 }, { year, month: 3, day: 20 }, (d) =>
        d.year === 2005 && d.day === 15 ? -999 : d.year * 100 + d.day
      )
    );
  }
  return norm(records);
}

/** Dec 20–31 of 1999–2011 carry 10, Jan 1–10 of 2000–2011 carry 0. */
function yearEndSeries() {
  const records: RawRecord[] = [];
  for (let year = 1999; year <= 2011; year++) {
    records.push(...dailyRecords({ year, month: 12, day: 20 }, { year, month: 12, day: 31 }, () => 10));
    if (year >= 2000) {
      records.push(...dailyRecords({ year, month: 1, day: 1 }, { year, month: 1, day: 10 }, () => 0));
    }
  }
  return norm(records);
}

describe("Day-of-year selection", () => {
  it("window 0 takes exactly the target day's value and omits years without it", () => {
    const set = select(marchSeries(), 3, 15, 0);
    expect(set.samples.map((s) => s.year)).toEqual([
      2000, 2001, 2002, 2003, 2004, 2006, 2007, 2008, 2009, 2010, 2011,
    ]);
    for (const s of set.samples) {
      expect(s.value).toBe(s.year * 100 + 15);
      expect(s.observations).toBe(1);
    }
  });

  it("averages in-window values and skips missing days", () => {
    const set = select(marchSeries(), 3, 15, 2);
    expect(set.samples).toHaveLength(12);
    const y2004 = set.samples.find((s) => s.year === 2004);
    expect(y2004).toEqual({ year: 2004, value: 200415, observations: 5 });
    const y2005 = set.samples.find((s) => s.year === 2005);
    expect(y2005).toEqual({ year: 2005, value: 200515, observations: 4 });
  });

  it("Jan 1 ± 3 reaches back into the previous December", () => {
    const set = select(yearEndSeries(), 1, 1, 3);
    // 1999 has only December data, so its Jan 1 window is empty
    expect(set.samples.map((s) => s.year)).toEqual([
      2000, 2001, 2002, 2003, 2004, 2005, 2006, 2007, 2008, 2009, 2010, 2011,
    ]);
    for (const s of set.samples) {
      expect(s.observations).toBe(7);
      expect(s.value).toBe(30 / 7);
    }
  });

  it("Dec 31 ± 3 reaches forward into the following January", () => {
    const set = select(yearEndSeries(), 12, 31, 3);
    expect(set.samples).toHaveLength(13);
    expect(set.samples[0]).toEqual({ year: 1999, value: 40 / 7, observations: 7 });
    // No January 2012 in the record
    expect(set.samples[12]).toEqual({ year: 2011, value: 10, observations: 4 });
  });

  it("Feb 29 uses leap years only with window 0 and Feb 28 otherwise", () => {
    const records: RawRecord[] = [];
    for (let year = 2000; year <= 2011; year++) {
      records.push(
        ...dailyRecords({ year, month: 2, day: 27 }, { year, month: 3, day: 2 }, (d) => d.month * 100 + d.day)
      );
    }
    const series = norm(records);

    const exact = select(series, 2, 29, 0, { minYears: 3 });
    expect(exact.samples.map((s) => s.year)).toEqual([2000, 2004, 2008]);
    expect(exact.samples.every((s) => s.value === 229)).toBe(true);

    const windowed = select(series, 2, 29, 1);
    expect(windowed.samples).toHaveLength(12);
    expect(windowed.samples.find((s) => s.year === 2004)).toEqual({
      year: 2004,
      value: (228 + 229 + 301) / 3,
      observations: 3,
    });
    expect(windowed.samples.find((s) => s.year === 2001)).toEqual({
      year: 2001,
      value: (227 + 228 + 301) / 3,
      observations: 3,
    });
  });

  it("fails with InsufficientDataError below the year floor", () => {
    const records: RawRecord[] = [];
    for (let year = 2000; year <= 2004; year++) {
      records.push({ date: `${year}-06-01`, value: year });
    }
    try {
      select(norm(records), 6, 1, 0, { minYears: 10 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientDataError);
      if (err instanceof InsufficientDataError) {
        expect(err.available).toBe(5);
        expect(err.required).toBe(10);
        expect(err.stage).toBe("select");
      }
    }
  });

  it("rejects invalid targets and windows", () => {
    const series = marchSeries();
    expect(() => select(series, 2, 30, 0)).toThrow(MalformedRecordError);
    expect(() => select(series, 3, 15, 91)).toThrow(MalformedRecordError);
    expect(() => select(series, 3, 15, 1.5)).toThrow(MalformedRecordError);
  });

  it("does not depend on input record order", () => {
    const records: RawRecord[] = [];
    for (let year = 2000; year <= 2011; year++) {
      records.push(
        ...dailyRecords({ year, month: 7, day: 1 }, { year, month: 7, day: 9 }, (d) => d.year + d.day / 10)
      );
    }
    const permuted = shuffled(records);
    expect(permuted).toEqual(shuffled(records));
    expect(permuted).not.toEqual(records);
    const a = select(norm(records), 7, 5, 3);
    const b = select(norm(permuted), 7, 5, 3);
    expect(b.fingerprint).toBe(a.fingerprint);
    expect(b.samples).toEqual(a.samples);
  });
});

describe("createSampleSet", () => {
  it("fingerprints identical content identically", () => {
    const target = { month: 1, day: 1, windowDays: 0 };
    const a = createSampleSet("temperature", target, [{ year: 2000, value: 1 }, { year: 2001, value: 2 }]);
    const b = createSampleSet("temperature", target, [{ year: 2000, value: 1 }, { year: 2001, value: 2 }]);
    const c = createSampleSet("temperature", target, [{ year: 2000, value: 1 }, { year: 2001, value: 3 }]);
    expect(a.fingerprint).toBe(b.fingerprint);
    expect(a.fingerprint).not.toBe(c.fingerprint);
    expect(a.fingerprint).toMatch(/^[a-f0-9]{64}$/);
  });

  it("requires strictly increasing years", () => {
    const target = { month: 1, day: 1, windowDays: 0 };
    expect(() =>
      createSampleSet("temperature", target, [{ year: 2001, value: 1 }, { year: 2000, value: 2 }])
    ).toThrow(MalformedRecordError);
  });
});

describe("Synthetic fixtures", () => {
  it("draws the same noise for the same seed", () => {
    expect(noisyTrendRecords(2000, 2001, 0.5, 1)).toEqual(noisyTrendRecords(2000, 2001, 0.5, 1));
    expect(noisyTrendRecords(2000, 2001, 0.5, 1, 7)).not.toEqual(noisyTrendRecords(2000, 2001, 0.5, 1));
  });
});
