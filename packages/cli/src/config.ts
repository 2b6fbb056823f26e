/**
 * CLI configuration resolution.
 *
 * Priority: command-line flags > environment variables > defaults.
 *
 * Environment variables:
 * - `HUSHLINE_THRESHOLD` default match threshold, 0-100 (default: 85)
 * - `HUSHLINE_OUTPUT_DIR` where output files go (default: ./hushline-out)
 * - `HUSHLINE_EPSILON` interval merge tolerance in seconds (default: 0.001)
 */

import { DEFAULT_EPSILON, DEFAULT_THRESHOLD } from "@hushline/core";

export interface ConfigOverrides {
  threshold?: number | null;
  outDir?: string | null;
  epsilon?: number | null;
}

/** Fully resolved config with all defaults applied. */
export interface ResolvedConfig {
  threshold: number;
  outDir: string;
  epsilon: number;
}

export const DEFAULT_OUTPUT_DIR = "hushline-out";

/** Parse a numeric env var; unset, blank or out-of-range values give null. */
function envNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  min: number,
  max: number,
): number | null {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return null;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min || n > max) {
    console.error(`Ignoring ${name}=${raw}: expected a number from ${min} to ${max}`);
    return null;
  }
  return n;
}

export function resolveConfig(
  overrides?: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const threshold =
    overrides?.threshold ??
    envNumber(env, "HUSHLINE_THRESHOLD", 0, 100) ??
    DEFAULT_THRESHOLD;

  const outDir =
    overrides?.outDir || env.HUSHLINE_OUTPUT_DIR || DEFAULT_OUTPUT_DIR;

  const epsilon =
    overrides?.epsilon ??
    envNumber(env, "HUSHLINE_EPSILON", 0, Number.POSITIVE_INFINITY) ??
    DEFAULT_EPSILON;

  return { threshold, outDir, epsilon };
}
