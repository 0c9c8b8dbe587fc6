import { isClimateVariable } from "../sources/variables.js";
import type { ClimateVariable } from "../shared/types.js";

export interface AnalyzeArgs {
  input: string;
  variable: ClimateVariable;
  month: number;
  day: number;
  windowDays?: number;
  minYears?: number;
  family?: string;
  latitude?: number;
  longitude?: number;
  label?: string;
  out?: string;
}

export const USAGE = `Usage: npm run analyze -- --input <series.json|series.csv> --date <MM-DD>
       [--variable temperature|precipitation|wind_speed|relative_humidity|solar_radiation]
       [--window <days>] [--min-years <n>] [--family normal|lognormal|gamma]
       [--lat <deg> --lon <deg>] [--label <name>] [--out <bundle.zip>]`;

function numberArg(flag: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n)) {
    throw new Error(`${flag} expects a number, got "${raw}"`);
  }
  return n;
}

/**
 * Parse `analyze` CLI arguments. Throws with a readable message on bad input.
 */
export function parseAnalyzeArgs(argv: string[]): AnalyzeArgs {
  const values = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (!flag.startsWith("--")) {
      throw new Error(`Unexpected argument: ${flag}`);
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for ${flag}`);
    }
    values.set(flag.slice(2), value);
    i++;
  }

  const input = values.get("input");
  if (!input) throw new Error("--input is required");

  const date = values.get("date");
  const m = date ? /^(\d{1,2})-(\d{1,2})$/.exec(date) : null;
  if (!m) throw new Error("--date is required in MM-DD form");

  const variable = values.get("variable") ?? "temperature";
  if (!isClimateVariable(variable)) {
    throw new Error(`Unknown variable "${variable}"`);
  }

  const optionalNumber = (name: string): number | undefined => {
    const raw = values.get(name);
    return raw === undefined ? undefined : numberArg(`--${name}`, raw);
  };

  return {
    input,
    variable,
    month: Number(m[1]),
    day: Number(m[2]),
    windowDays: optionalNumber("window"),
    minYears: optionalNumber("min-years"),
    family: values.get("family"),
    latitude: optionalNumber("lat"),
    longitude: optionalNumber("lon"),
    label: values.get("label"),
    out: values.get("out"),
  };
}
