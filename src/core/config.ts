/**
 * Library Configuration
 * Curve defaults and log level, overridable through the environment
 */

import { z } from "zod";
import { exponentSchema, parseOrThrow, subdivisionsSchema } from "./color/schemas";
import { LogLevel } from "./monitoring/types";

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_EXPONENT = 2;
export const DEFAULT_SUBDIVISIONS = 32;

export const ENV_KEYS = {
  exponent: "EXPONENTIAL_GRADIENT_EXPONENT",
  subdivisions: "EXPONENTIAL_GRADIENT_SUBDIVISIONS",
  logLevel: "EXPONENTIAL_GRADIENT_LOG_LEVEL",
} as const;

// ============================================================================
// Schema
// ============================================================================

export const logLevelSchema = z.nativeEnum(LogLevel);

export const configSchema = z.object({
  defaultExponent: exponentSchema,
  defaultSubdivisions: subdivisionsSchema,
  logLevel: logLevelSchema,
});

export type GradientConfig = z.infer<typeof configSchema>;

const envSchema = z.object({
  [ENV_KEYS.exponent]: z.coerce.number().pipe(exponentSchema).default(DEFAULT_EXPONENT),
  [ENV_KEYS.subdivisions]: z.coerce.number().pipe(subdivisionsSchema).default(DEFAULT_SUBDIVISIONS),
  [ENV_KEYS.logLevel]: logLevelSchema.default(LogLevel.WARN),
});

// ============================================================================
// Loading
// ============================================================================

let current: GradientConfig | null = null;

/**
 * Build a configuration from an environment-like record.
 * Unset keys take their defaults; malformed values throw INVALID_PARAMETER.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): GradientConfig {
  const parsed = parseOrThrow(envSchema, env, "configuration");
  return {
    defaultExponent: parsed[ENV_KEYS.exponent],
    defaultSubdivisions: parsed[ENV_KEYS.subdivisions],
    logLevel: parsed[ENV_KEYS.logLevel],
  };
}

/**
 * Active configuration, loaded from process.env on first access
 */
export function getConfig(): GradientConfig {
  if (!current) {
    current = loadConfig();
  }
  return current;
}

/**
 * Override parts of the active configuration
 */
export function configure(overrides: Partial<GradientConfig>): GradientConfig {
  current = parseOrThrow(configSchema, { ...getConfig(), ...overrides }, "configuration");
  return current;
}

/**
 * Drop the cached configuration so the next access reloads it
 */
export function resetConfig(): void {
  current = null;
}
