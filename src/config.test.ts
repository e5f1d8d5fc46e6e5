import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, loadConfig, validateTrimFraction } from "./config.js";
import { ValidationError } from "./errors.js";

describe("loadConfig", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      trimFraction: 0.05,
      matchStrategy: "id",
      markerFileName: ".done_split",
      logLevel: "info",
    });
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ SECTION_TRIM_FRACTION: "  ", LOG_LEVEL: "" })).toEqual(DEFAULT_CONFIG);
  });

  it("reads every setting", () => {
    expect(
      loadConfig({
        SECTION_TRIM_FRACTION: "0.1",
        SECTION_MATCH_STRATEGY: "position",
        SECTION_MARKER_FILE: ".split_ok",
        LOG_LEVEL: "DEBUG",
      }),
    ).toEqual({
      trimFraction: 0.1,
      matchStrategy: "position",
      markerFileName: ".split_ok",
      logLevel: "debug",
    });
  });

  it("rejects a non-numeric trim fraction", () => {
    expect(() => loadConfig({ SECTION_TRIM_FRACTION: "five" })).toThrow(
      "SECTION_TRIM_FRACTION 'five' is not a number",
    );
  });

  it("rejects an unknown match strategy", () => {
    expect(() => loadConfig({ SECTION_MATCH_STRATEGY: "fuzzy" })).toThrow(ValidationError);
  });

  it("rejects a marker path with directories", () => {
    expect(() => loadConfig({ SECTION_MARKER_FILE: "sub/.done" })).toThrow(
      "SECTION_MARKER_FILE 'sub/.done' must be a bare file name",
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ValidationError);
  });
});

describe("validateTrimFraction", () => {
  it("accepts zero", () => {
    expect(validateTrimFraction(0)).toBe(0);
  });

  it("rejects one half and above", () => {
    expect(() => validateTrimFraction(0.5)).toThrow("Trim fraction must be a number in [0, 0.5), got 0.5");
  });

  it("rejects negative values", () => {
    expect(() => validateTrimFraction(-0.1)).toThrow(ValidationError);
  });
});
