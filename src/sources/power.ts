/**
 * NASA POWER daily point payload.
 *
 * The HTTP call lives outside this project; this module only validates an
 * already-fetched JSON document and turns it into raw records for the
 * normalizer. Daily values are keyed by compact YYYYMMDD dates and missing
 * days carry `header.fill_value` (-999 when absent).
 */

import { z } from "zod";
import { MalformedRecordError } from "../shared/errors.js";
import { getVariableInfo } from "./variables.js";
import type { FetchedSeries } from "../cache/series_cache.js";
import type { ClimateVariable } from "../shared/types.js";

export const POWER_DEFAULT_FILL_VALUE = -999;

export const PowerDailyResponseSchema = z
  .object({
    geometry: z
      .object({ coordinates: z.array(z.number()).min(2) })
      .passthrough()
      .optional(),
    properties: z.object({
      parameter: z.record(z.record(z.number().nullable())),
    }),
    header: z
      .object({ fill_value: z.number().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type PowerDailyResponse = z.infer<typeof PowerDailyResponseSchema>;

export function parsePowerDailyResponse(json: unknown, variable: ClimateVariable): FetchedSeries {
  const parsed = PowerDailyResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedRecordError(
      "normalize",
      `Not a POWER daily response: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      { issues: parsed.error.issues.length }
    );
  }

  const code = getVariableInfo(variable).powerCode;
  const daily = parsed.data.properties.parameter[code];
  if (!daily) {
    throw new MalformedRecordError(
      "normalize",
      `POWER response has no "${code}" parameter (found: ${Object.keys(parsed.data.properties.parameter).join(", ") || "none"})`,
      { expected: code, variable }
    );
  }

  return {
    records: Object.entries(daily).map(([date, value]) => ({ date, value, variable })),
    missingSentinel: parsed.data.header?.fill_value ?? POWER_DEFAULT_FILL_VALUE,
    sourceId: `power:${code}`,
  };
}

/** Coordinates of the point the payload describes, when present. */
export function powerResponseLocation(
  json: unknown
): { latitude: number; longitude: number } | undefined {
  const parsed = PowerDailyResponseSchema.safeParse(json);
  const coords = parsed.success ? parsed.data.geometry?.coordinates : undefined;
  if (!coords) return undefined;
  // GeoJSON order: longitude, latitude[, elevation]
  return { latitude: coords[1], longitude: coords[0] };
}
