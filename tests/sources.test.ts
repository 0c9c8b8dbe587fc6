import { describe, it, expect } from "vitest";
import {
  parsePowerDailyResponse,
  powerResponseLocation,
  POWER_DEFAULT_FILL_VALUE,
} from "../src/sources/power.js";
import { parseSeriesCsv } from "../src/sources/csv_series.js";
import {
  getVariableInfo,
  isClimateVariable,
  variableFromPowerCode,
} from "../src/sources/variables.js";
import { normalize } from "../src/series/normalizer.js";
import { MalformedRecordError } from "../src/shared/errors.js";

const powerPayload = {
  type: "Feature",
  geometry: { type: "Point", coordinates: [-74.006, 40.7128, 12.3] },
  properties: {
    parameter: {
      T2M: { "20200101": 1.5, "20200102": -999, "20200103": 2.25 },
    },
  },
  header: { title: "Daily point data", fill_value: -999 },
};

describe("POWER daily payload", () => {
  it("turns the parameter map into raw records", () => {
    const fetched = parsePowerDailyResponse(powerPayload, "temperature");
    expect(fetched.sourceId).toBe("power:T2M");
    expect(fetched.missingSentinel).toBe(-999);
    expect(fetched.records).toEqual([
      { date: "20200101", value: 1.5, variable: "temperature" },
      { date: "20200102", value: -999, variable: "temperature" },
      { date: "20200103", value: 2.25, variable: "temperature" },
    ]);

    const series = normalize(fetched.records, fetched.missingSentinel, {
      variable: "temperature",
      minValidPoints: 2,
    });
    expect(series.points.map((p) => p.value)).toEqual([1.5, null, 2.25]);
    expect(series.points[0].date).toBe("2020-01-01");
  });

  it("falls back to the default fill value", () => {
    const { header: _header, ...noHeader } = powerPayload;
    expect(parsePowerDailyResponse(noHeader, "temperature").missingSentinel).toBe(
      POWER_DEFAULT_FILL_VALUE
    );
  });

  it("rejects a payload without the variable's parameter", () => {
    expect(() => parsePowerDailyResponse(powerPayload, "precipitation")).toThrow(
      /no "PRECTOTCORR" parameter \(found: T2M\)/
    );
  });

  it("rejects something that is not a POWER payload", () => {
    expect(() => parsePowerDailyResponse({ rows: [] }, "temperature")).toThrow(MalformedRecordError);
  });

  it("reads the point location from GeoJSON order", () => {
    expect(powerResponseLocation(powerPayload)).toEqual({ latitude: 40.7128, longitude: -74.006 });
    expect(powerResponseLocation({ properties: { parameter: {} } })).toBeUndefined();
  });
});

describe("CSV series", () => {
  it("reads numbers, blanks and text cells", () => {
    const fetched = parseSeriesCsv("date,value\n2020-01-01,3.5\n2020-01-02,\n2020-01-03,n/a\n");
    expect(fetched.records).toEqual([
      { date: "2020-01-01", value: 3.5 },
      { date: "2020-01-02", value: null },
      { date: "2020-01-03", value: "n/a" },
    ]);
    expect(fetched.missingSentinel).toBe(-999);
    expect(fetched.sourceId).toBe("csv");
  });

  it("lets the normalizer reject text values", () => {
    const fetched = parseSeriesCsv("date,value\n2020-01-01,3.5\n2020-01-03,n/a\n");
    expect(() =>
      normalize(fetched.records, fetched.missingSentinel, { variable: "temperature", minValidPoints: 1 })
    ).toThrow(MalformedRecordError);
  });

  it("supports custom column names", () => {
    const fetched = parseSeriesCsv("day,t2m,flag\n20200101,4,ok\n", {
      dateColumn: "day",
      valueColumn: "t2m",
      missingSentinel: -99,
      sourceId: "station-7",
    });
    expect(fetched.records).toEqual([{ date: "20200101", value: 4 }]);
    expect(fetched.missingSentinel).toBe(-99);
    expect(fetched.sourceId).toBe("station-7");
  });

  it("reports a missing column", () => {
    expect(() => parseSeriesCsv("when,value\n2020-01-01,1\n")).toThrow(
      'CSV is missing column "date" (found: when, value)'
    );
  });
});

describe("Variable catalog", () => {
  it("maps variables to POWER codes and back", () => {
    expect(getVariableInfo("precipitation")).toMatchObject({
      powerCode: "PRECTOTCORR",
      unit: "mm/day",
      defaultFamily: "gamma",
    });
    expect(variableFromPowerCode("ws2m")).toBe("wind_speed");
    expect(variableFromPowerCode("XYZ")).toBeUndefined();
    expect(isClimateVariable("solar_radiation")).toBe(true);
    expect(isClimateVariable("snow")).toBe(false);
  });
});
