/**
 * Exponential Color Interpolation
 */

import { validateExponent } from "./schemas";
import type { ColorChannels, ColorModel } from "./types";

/**
 * Interpolate every channel (alpha included) by the warped fraction t^exponent.
 * t is the linear position within a segment and is not clamped.
 *
 * @example
 * // Halfway with exponent 2 lands a quarter of the way to b
 * lerpExp(black, white, 0.5, 2) // { r: 0.25, g: 0.25, b: 0.25, a: 1 }
 */
export function lerpExp(a: ColorChannels, b: ColorChannels, t: number, exponent: number): ColorChannels {
  validateExponent(exponent);

  // Ends are returned as copies so they stay bit-identical to the inputs
  if (t === 0) return { r: a.r, g: a.g, b: a.b, a: a.a };
  if (t === 1) return { r: b.r, g: b.g, b: b.b, a: b.a };

  const f = Math.pow(t, exponent);
  return {
    r: a.r + (b.r - a.r) * f,
    g: a.g + (b.g - a.g) * f,
    b: a.b + (b.b - a.b) * f,
    a: a.a + (b.a - a.a) * f,
  };
}

/**
 * Interpolate two host colors through an injected color model.
 * Extraction failures from the model propagate unchanged.
 */
export function interpolateColor<C>(
  model: ColorModel<C>,
  from: C,
  to: C,
  t: number,
  exponent: number
): C {
  return model.fromChannels(lerpExp(model.toChannels(from), model.toChannels(to), t, exponent));
}
