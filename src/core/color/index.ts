/**
 * Exponential Gradient Color Utilities
 *
 * Organization:
 * - interpolate: exponential interpolation of normalized channels
 * - subdivide: segment subdivision of stop lists
 * - model: injected channel extraction (channels, CSS colors via colord)
 * - gradients: descriptors, linear-gradient primitives and CSS output
 * - schemas: zod validation of curve parameters
 * - errors: typed gradient failures
 */

export * from "./interpolate";
export * from "./subdivide";
export * from "./model";
export * from "./gradients";
export * from "./schemas";
export * from "./errors";
export type {
  ColorChannels,
  ColorModel,
  ColorStop,
  Gradient,
  CurveParameters,
  UnitPoint,
  ExponentialGradient,
  LinearGradientPrimitive,
} from "./types";
