/**
 * Analysis Configuration Module
 *
 * Thresholds and defaults for one analysis run. Resolution order for each
 * field: explicit override, then environment variable, then default.
 *
 *   CLIMATOLOGY_MIN_YEARS         minimum sampled years (default 10)
 *   CLIMATOLOGY_MIN_POINTS        minimum valid daily points (default 10)
 *   CLIMATOLOGY_WINDOW_DAYS       ± window around the target day (default 0)
 *   CLIMATOLOGY_MISSING_SENTINEL  provider fill value (default -999)
 */

import { z } from "zod";

export const DEFAULT_QUANTILES = [0.1, 0.25, 0.5, 0.75, 0.9] as const;

export const AnalysisConfigSchema = z.object({
  minYears: z.number().int().min(2).default(10),
  minValidPoints: z.number().int().min(1).default(10),
  windowDays: z.number().int().min(0).max(90).default(0),
  missingSentinel: z.number().default(-999),
  quantiles: z
    .array(z.number().gt(0).lt(1))
    .min(1)
    .default([...DEFAULT_QUANTILES]),
  volatilityThreshold: z.number().min(0).max(1).default(0.15),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;

type Env = Record<string, string | undefined>;

const ENV_KEYS = {
  minYears: "CLIMATOLOGY_MIN_YEARS",
  minValidPoints: "CLIMATOLOGY_MIN_POINTS",
  windowDays: "CLIMATOLOGY_WINDOW_DAYS",
  missingSentinel: "CLIMATOLOGY_MISSING_SENTINEL",
} as const;

function readEnvNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid numeric value for ${key}: "${raw}"`);
  }
  return n;
}

/**
 * Resolve the configuration for a run.
 * Throws a ZodError when a resolved value is out of range.
 */
export function resolveAnalysisConfig(
  overrides: AnalysisConfigInput = {},
  env: Env = process.env
): AnalysisConfig {
  const fromEnv: AnalysisConfigInput = {
    minYears: readEnvNumber(env, ENV_KEYS.minYears),
    minValidPoints: readEnvNumber(env, ENV_KEYS.minValidPoints),
    windowDays: readEnvNumber(env, ENV_KEYS.windowDays),
    missingSentinel: readEnvNumber(env, ENV_KEYS.missingSentinel),
  };
  // An override left undefined must not mask the environment value
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, v]) => v !== undefined)
  );
  return AnalysisConfigSchema.parse({ ...fromEnv, ...defined });
}
