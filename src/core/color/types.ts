/**
 * Gradient Types
 * Shared shapes for color channels, stops and gradient descriptors
 */

// ============================================================================
// Colors
// ============================================================================

/**
 * Normalized RGBA color, every channel in 0-1
 */
export interface ColorChannels {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * Converts between a host color value and normalized channels.
 * toChannels must throw rather than guess when it cannot represent a color.
 */
export interface ColorModel<C> {
  toChannels(color: C): ColorChannels;
  fromChannels(channels: ColorChannels): C;
}

// ============================================================================
// Stops
// ============================================================================

export interface ColorStop<C = ColorChannels> {
  color: C;
  location: number; // conventionally 0-1, never clamped
}

export type Gradient<C = ColorChannels> = readonly ColorStop<C>[];

export interface CurveParameters {
  /** 1 is linear, above 1 starts slow, below 1 starts fast */
  exponent: number;
  /** Generated sub-steps per segment */
  subdivisions: number;
}

// ============================================================================
// Geometry
// ============================================================================

/**
 * Point in the unit square, origin top-left, y pointing down
 */
export interface UnitPoint {
  x: number;
  y: number;
}

// ============================================================================
// Descriptors
// ============================================================================

export interface ExponentialGradient<C> extends CurveParameters {
  stops: Gradient<C>;
  startPoint: UnitPoint;
  endPoint: UnitPoint;
}

/**
 * Input of a host linear-gradient primitive
 */
export interface LinearGradientPrimitive<C> {
  stops: Gradient<C>;
  startPoint: UnitPoint;
  endPoint: UnitPoint;
}
