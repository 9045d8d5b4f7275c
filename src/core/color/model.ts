/**
 * Color Models
 * Channel extraction capabilities injected into the interpolator
 *
 * - channelModel: identity over normalized RGBA channels
 * - cssColorModel: CSS color strings (hex, rgb, hsl, named) powered by colord
 */

import { colord, extend, type AnyColor, type Colord } from "colord";
import namesPlugin from "colord/plugins/names";
import { unsupportedColorFormat } from "./errors";
import { channelsSchema } from "./schemas";
import type { ColorChannels, ColorModel } from "./types";

// Extend colord with plugins
extend([namesPlugin]);

export type CssColorInput = AnyColor | Colord;

// ============================================================================
// Channel Model
// ============================================================================

/**
 * Identity model for colors that are already normalized channels
 */
export const channelModel: ColorModel<ColorChannels> = {
  toChannels(color: ColorChannels): ColorChannels {
    const result = channelsSchema.safeParse(color);
    if (!result.success) {
      throw unsupportedColorFormat("Color channels must be finite numbers", result.error.issues);
    }
    return result.data;
  },
  fromChannels(channels: ColorChannels): ColorChannels {
    return channels;
  },
};

// ============================================================================
// CSS Color Model
// ============================================================================

/**
 * Convert any CSS color input to normalized channels
 *
 * @example
 * toChannels("red") // { r: 1, g: 0, b: 0, a: 1 }
 * toChannels("#00000080") // { r: 0, g: 0, b: 0, a: 0.5 }
 */
export function toChannels(input: CssColorInput): ColorChannels {
  const c = colord(input);
  if (!c.isValid()) {
    throw unsupportedColorFormat(`Unsupported color: ${describe(input)}`, input);
  }
  const { r, g, b, a } = c.rgba;
  const channels = channelsSchema.safeParse({ r: r / 255, g: g / 255, b: b / 255, a });
  if (!channels.success) {
    throw unsupportedColorFormat(`Unsupported color: ${describe(input)}`, channels.error.issues);
  }
  return channels.data;
}

/**
 * Convert normalized channels to an rgba() string
 */
export function fromChannels(channels: ColorChannels): string {
  const { r, g, b, a } = colord({
    r: channels.r * 255,
    g: channels.g * 255,
    b: channels.b * 255,
    a: channels.a,
  }).toRgb();
  return `rgba(${r}, ${g}, ${b}, ${a})`;
}

export const cssColorModel: ColorModel<CssColorInput> = {
  toChannels,
  fromChannels,
};

function describe(input: CssColorInput): string {
  return typeof input === "string" ? `"${input}"` : JSON.stringify(input);
}
