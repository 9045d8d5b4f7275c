/**
 * Gradient Construction Utilities
 * Build exponential gradient descriptors and hand them to linear-gradient renderers
 */

import { z } from "zod";
import { getConfig } from "../config";
import { logger } from "../monitoring/logger";
import { invalidParameter, isGradientError } from "./errors";
import { cssColorModel, fromChannels, toChannels, type CssColorInput } from "./model";
import { curveParametersSchema, parseOrThrow, unitPointSchema } from "./schemas";
import { subdivideWith } from "./subdivide";
import type {
  ColorModel,
  ColorStop,
  ExponentialGradient,
  Gradient,
  LinearGradientPrimitive,
  UnitPoint,
} from "./types";

// ============================================================================
// Types
// ============================================================================

interface GradientGeometry {
  startPoint?: UnitPoint;
  endPoint?: UnitPoint;
  exponent?: number;
  subdivisions?: number;
}

export type ExponentialGradientOptions<C> = GradientGeometry &
  ({ stops: Gradient<C>; colors?: undefined } | { colors: readonly C[]; stops?: undefined });

export type CssFallback = "none" | "linear";

export interface CssGradientOptions {
  /**
   * "none" rethrows gradient errors, "linear" logs a warning and renders the
   * original stops without subdivision. The fallback writes string colors
   * verbatim and converts object colors, so an object color colord cannot
   * read still throws UNSUPPORTED_COLOR_FORMAT.
   */
  fallback?: CssFallback;
}

// ============================================================================
// Anchor Points
// ============================================================================

export const UnitPoints = {
  topLeading: { x: 0, y: 0 },
  top: { x: 0.5, y: 0 },
  topTrailing: { x: 1, y: 0 },
  leading: { x: 0, y: 0.5 },
  center: { x: 0.5, y: 0.5 },
  trailing: { x: 1, y: 0.5 },
  bottomLeading: { x: 0, y: 1 },
  bottom: { x: 0.5, y: 1 },
  bottomTrailing: { x: 1, y: 1 },
} as const;

const geometrySchema = curveParametersSchema.partial().extend({
  startPoint: unitPointSchema.optional(),
  endPoint: unitPointSchema.optional(),
});

const locationsSchema = z.array(z.object({ location: z.number().finite() }));

// ============================================================================
// Construction
// ============================================================================

/**
 * Spread colors evenly, the i-th at i / (n - 1). A single color sits at 0.
 */
export function stopsFromColors<C>(colors: readonly C[]): ColorStop<C>[] {
  const last = colors.length - 1;
  return colors.map((color, i) => ({ color, location: last > 0 ? i / last : 0 }));
}

/**
 * Create an immutable exponential gradient from either stops or colors
 *
 * @example
 * createExponentialGradient({
 *   colors: ["#1e3a8a", "#9333ea"],
 *   startPoint: UnitPoints.top,
 *   endPoint: UnitPoints.bottom,
 *   exponent: 3,
 * })
 */
export function createExponentialGradient<C>(
  options: ExponentialGradientOptions<C>
): ExponentialGradient<C> {
  const hasStops = options.stops !== undefined;
  const hasColors = options.colors !== undefined;
  if (hasStops === hasColors) {
    throw invalidParameter("Provide exactly one of stops or colors");
  }

  const geometry = parseOrThrow(
    geometrySchema,
    {
      startPoint: options.startPoint,
      endPoint: options.endPoint,
      exponent: options.exponent,
      subdivisions: options.subdivisions,
    },
    "gradient options"
  );

  const stops = options.stops ?? stopsFromColors(options.colors ?? []);
  parseOrThrow(locationsSchema, stops, "stops");

  const config = getConfig();
  return Object.freeze({
    stops: Object.freeze(stops.map((stop) => Object.freeze({ ...stop }))),
    startPoint: Object.freeze({ ...(geometry.startPoint ?? UnitPoints.leading) }),
    endPoint: Object.freeze({ ...(geometry.endPoint ?? UnitPoints.trailing) }),
    exponent: geometry.exponent ?? config.defaultExponent,
    subdivisions: geometry.subdivisions ?? config.defaultSubdivisions,
  });
}

/**
 * Subdivide a gradient into the stops and anchors a linear-gradient primitive paints
 */
export function resolveLinearGradient<C>(
  gradient: ExponentialGradient<C>,
  model: ColorModel<C>
): LinearGradientPrimitive<C> {
  return {
    stops: subdivideWith(model, gradient.stops, gradient.exponent, gradient.subdivisions),
    startPoint: gradient.startPoint,
    endPoint: gradient.endPoint,
  };
}

// ============================================================================
// CSS Output
// ============================================================================

/**
 * CSS angle of the start-to-end vector (0deg points up, 90deg right).
 * Coincident anchors fall back to 180deg, the CSS default direction.
 */
export function cssAngle(startPoint: UnitPoint, endPoint: UnitPoint): number {
  const dx = endPoint.x - startPoint.x;
  const dy = endPoint.y - startPoint.y;
  if (dx === 0 && dy === 0) {
    return 180;
  }
  const degrees = (Math.atan2(dx, -dy) * 180) / Math.PI;
  return round(((degrees % 360) + 360) % 360);
}

/**
 * Fraction of the CSS gradient line, for a given angle, at which a point of
 * the unit box projects. The line runs through the center and is
 * |sin| + |cos| long, so its ends touch the box corners.
 */
function gradientLinePosition(angle: number, point: UnitPoint): number {
  const radians = (angle * Math.PI) / 180;
  const dirX = Math.sin(radians);
  const dirY = -Math.cos(radians);
  const length = Math.abs(dirX) + Math.abs(dirY);
  return ((point.x - 0.5) * dirX + (point.y - 0.5) * dirY) / length + 0.5;
}

/**
 * Generate a CSS linear-gradient string for a gradient of CSS colors.
 * Stop locations are placed between the anchors' projections on the gradient
 * line, so inset anchors leave the edges in the first and last colors.
 * A lone stop is written twice and renders as a solid color; a gradient
 * without stops has no CSS form and throws INVALID_PARAMETER.
 *
 * @example
 * toCssLinearGradient(createExponentialGradient({ colors: ["red", "blue"], subdivisions: 2 }))
 * // "linear-gradient(90deg, rgba(255, 0, 0, 1) 0%, rgba(191, 0, 64, 1) 50%, blue 100%)"
 */
export function toCssLinearGradient(
  gradient: ExponentialGradient<CssColorInput>,
  options: CssGradientOptions = {}
): string {
  const { fallback = "none" } = options;

  if (gradient.stops.length === 0) {
    throw invalidParameter("Cannot render a gradient without stops");
  }

  let stops: Gradient<CssColorInput>;
  try {
    stops = resolveLinearGradient(gradient, cssColorModel).stops;
  } catch (error) {
    if (fallback !== "linear" || !isGradientError(error)) {
      throw error;
    }
    logger.warn("Exponential gradient fell back to linear rendering", {
      component: "toCssLinearGradient",
      code: error.code,
      reason: error.message,
    });
    stops = gradient.stops;
  }

  const angle = cssAngle(gradient.startPoint, gradient.endPoint);

  if (stops.length === 1) {
    const solid = formatCssColor(stops[0].color);
    return `linear-gradient(${angle}deg, ${solid} 0%, ${solid} 100%)`;
  }

  const from = gradientLinePosition(angle, gradient.startPoint);
  const to = gradientLinePosition(angle, gradient.endPoint);

  const stopStrings = stops
    .map((stop) => {
      const position = from + stop.location * (to - from);
      return `${formatCssColor(stop.color)} ${round(position * 100)}%`;
    })
    .join(", ");

  return `linear-gradient(${angle}deg, ${stopStrings})`;
}

function formatCssColor(input: CssColorInput): string {
  return typeof input === "string" ? input : fromChannels(toChannels(input));
}

function round(value: number): number {
  return Number(value.toFixed(4));
}
