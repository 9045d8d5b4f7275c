/**
 * Configuration Tests
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { configure, getConfig, loadConfig, resetConfig, ENV_KEYS } from "../../../src/core/config";
import { subdivide } from "../../../src/core/color/subdivide";
import { GradientErrorCode } from "../../../src/core/color/errors";
import { LogLevel } from "../../../src/core/monitoring/types";
import { black, white, captureError } from "../../setup/helpers";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      defaultExponent: 2,
      defaultSubdivisions: 32,
      logLevel: LogLevel.WARN,
    });
  });

  it("reads overrides from the environment", () => {
    expect(
      loadConfig({
        [ENV_KEYS.exponent]: "1.5",
        [ENV_KEYS.subdivisions]: "64",
        [ENV_KEYS.logLevel]: "debug",
      })
    ).toEqual({
      defaultExponent: 1.5,
      defaultSubdivisions: 64,
      logLevel: LogLevel.DEBUG,
    });
  });

  it.each(Object.values(LogLevel))("accepts log level %s", (level) => {
    expect(loadConfig({ [ENV_KEYS.logLevel]: level }).logLevel).toBe(level);
  });

  it.each([
    [ENV_KEYS.exponent, "-2"],
    [ENV_KEYS.exponent, "steep"],
    [ENV_KEYS.subdivisions, "0"],
    [ENV_KEYS.subdivisions, "2.5"],
    [ENV_KEYS.logLevel, "loud"],
  ])("rejects %s=%s", (key, value) => {
    const error = captureError(() => loadConfig({ [key]: value }));
    expect(error).toMatchObject({ code: GradientErrorCode.INVALID_PARAMETER });
  });
});

describe("getConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it("loads from process.env once", () => {
    vi.stubEnv(ENV_KEYS.subdivisions, "8");
    resetConfig();
    expect(getConfig().defaultSubdivisions).toBe(8);

    vi.stubEnv(ENV_KEYS.subdivisions, "16");
    expect(getConfig().defaultSubdivisions).toBe(8);

    resetConfig();
    expect(getConfig().defaultSubdivisions).toBe(16);
  });

  it("applies runtime overrides to subdivision defaults", () => {
    configure({ defaultExponent: 1, defaultSubdivisions: 2 });

    const result = subdivide([
      { color: black, location: 0 },
      { color: white, location: 1 },
    ]);

    expect(result).toHaveLength(3);
    expect(result[1].color).toEqual({ r: 0.5, g: 0.5, b: 0.5, a: 1 });
  });

  it("rejects invalid overrides", () => {
    const error = captureError(() => configure({ defaultSubdivisions: 0 }));

    expect(error).toMatchObject({ code: GradientErrorCode.INVALID_PARAMETER });
    expect(getConfig().defaultSubdivisions).toBe(32);
  });
});
