/**
 * Gradient Subdivision
 * Approximates exponential interpolation between stops with a denser run of
 * linearly rendered stops.
 *
 * Locations advance linearly within each segment; only the colors follow the
 * t^exponent curve. Every segment contributes `subdivisions` stops starting at
 * its first stop, and the last input stop closes the run verbatim, so the
 * output holds (n - 1) * subdivisions + 1 stops for n >= 2.
 */

import { getConfig } from "../config";
import { interpolateColor } from "./interpolate";
import { channelModel } from "./model";
import { validateExponent, validateSubdivisions } from "./schemas";
import type { ColorChannels, ColorModel, ColorStop, Gradient } from "./types";

/**
 * Subdivide a gradient of normalized channel colors
 *
 * @example
 * subdivide([{ color: red, location: 0 }, { color: blue, location: 1 }], 2, 4)
 * // 5 stops at 0, 0.25, 0.5, 0.75, then the original blue stop at 1
 */
export function subdivide(
  stops: Gradient<ColorChannels>,
  exponent: number = getConfig().defaultExponent,
  subdivisions: number = getConfig().defaultSubdivisions
): Gradient<ColorChannels> {
  return subdivideWith(channelModel, stops, exponent, subdivisions);
}

/**
 * Subdivide a gradient whose colors are read and rebuilt through a color model
 */
export function subdivideWith<C>(
  model: ColorModel<C>,
  stops: Gradient<C>,
  exponent: number = getConfig().defaultExponent,
  subdivisions: number = getConfig().defaultSubdivisions
): Gradient<C> {
  validateExponent(exponent);
  validateSubdivisions(subdivisions);

  if (stops.length <= 1) {
    return stops;
  }

  const result: ColorStop<C>[] = [];

  for (let i = 0; i < stops.length - 1; i++) {
    const current = stops[i];
    const next = stops[i + 1];

    for (let step = 0; step < subdivisions; step++) {
      const t = step / subdivisions;
      result.push({
        color: interpolateColor(model, current.color, next.color, t, exponent),
        location: current.location + (next.location - current.location) * t,
      });
    }
  }

  result.push(stops[stops.length - 1]);
  return result;
}
