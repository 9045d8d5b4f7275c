/**
 * Shared test helpers
 */

import type { ColorChannels } from "../../src/core/color/types";

export const red: ColorChannels = { r: 1, g: 0, b: 0, a: 1 };
export const green: ColorChannels = { r: 0, g: 1, b: 0, a: 1 };
export const blue: ColorChannels = { r: 0, g: 0, b: 1, a: 1 };
export const black: ColorChannels = { r: 0, g: 0, b: 0, a: 1 };
export const white: ColorChannels = { r: 1, g: 1, b: 1, a: 1 };

/**
 * Run fn and return what it threw, failing when it returns normally
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}
