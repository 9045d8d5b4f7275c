/**
 * Gradient Schemas
 * Zod schemas and validation helpers for curve parameters and stops
 */

import { z } from "zod";
import { invalidParameter } from "./errors";

// ============================================================================
// Primitives
// ============================================================================

export const exponentSchema = z
  .number({ invalid_type_error: "exponent must be a number" })
  .finite("exponent must be finite")
  .positive("exponent must be greater than 0");

export const subdivisionsSchema = z
  .number({ invalid_type_error: "subdivisions must be a number" })
  .int("subdivisions must be an integer")
  .min(1, "subdivisions must be at least 1");

export const curveParametersSchema = z.object({
  exponent: exponentSchema,
  subdivisions: subdivisionsSchema,
});

export const channelsSchema = z.object({
  r: z.number().finite(),
  g: z.number().finite(),
  b: z.number().finite(),
  a: z.number().finite(),
});

export const unitPointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Get human-readable validation errors
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map((e) => {
    const path = e.path.length > 0 ? `${e.path.join(".")}: ` : "";
    return `${path}${e.message}`;
  });
}

/**
 * Parse a value or throw an INVALID_PARAMETER GradientError carrying the zod issues
 */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  throw invalidParameter(
    `Invalid ${label}: ${formatValidationErrors(result.error).join(", ")}`,
    result.error.issues
  );
}

export function validateExponent(exponent: number): number {
  return parseOrThrow(exponentSchema, exponent, "exponent");
}

export function validateSubdivisions(subdivisions: number): number {
  return parseOrThrow(subdivisionsSchema, subdivisions, "subdivisions");
}
