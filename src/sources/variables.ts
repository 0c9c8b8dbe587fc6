import type { ClimateVariable, DistributionFamily } from "../shared/types.js";

export interface VariableInfo {
  variable: ClimateVariable;
  /** NASA POWER daily parameter code. */
  powerCode: string;
  label: string;
  unit: string;
  defaultFamily: DistributionFamily;
}

export const VARIABLE_CATALOG: Record<ClimateVariable, VariableInfo> = {
  temperature: {
    variable: "temperature",
    powerCode: "T2M",
    label: "Temperature",
    unit: "°C",
    defaultFamily: "normal",
  },
  precipitation: {
    variable: "precipitation",
    powerCode: "PRECTOTCORR",
    label: "Rainfall",
    unit: "mm/day",
    defaultFamily: "gamma",
  },
  wind_speed: {
    variable: "wind_speed",
    powerCode: "WS2M",
    label: "Wind Speed",
    unit: "m/s",
    defaultFamily: "normal",
  },
  relative_humidity: {
    variable: "relative_humidity",
    powerCode: "RH2M",
    label: "Relative Humidity",
    unit: "%",
    defaultFamily: "normal",
  },
  solar_radiation: {
    variable: "solar_radiation",
    powerCode: "ALLSKY_SFC_SW_DWN",
    label: "Solar Radiation",
    unit: "kWh/m²/day",
    defaultFamily: "normal",
  },
};

export const CLIMATE_VARIABLES = [
  "temperature",
  "precipitation",
  "wind_speed",
  "relative_humidity",
  "solar_radiation",
] as const satisfies readonly ClimateVariable[];

export function isClimateVariable(value: string): value is ClimateVariable {
  return CLIMATE_VARIABLES.some((v) => v === value);
}

export function getVariableInfo(variable: ClimateVariable): VariableInfo {
  return VARIABLE_CATALOG[variable];
}

/** Look up a variable by its POWER code (case-insensitive). */
export function variableFromPowerCode(code: string): ClimateVariable | undefined {
  const upper = code.toUpperCase();
  return CLIMATE_VARIABLES.find((v) => VARIABLE_CATALOG[v].powerCode === upper);
}
