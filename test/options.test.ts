import { describe, it, expect, vi } from "vitest";
import { resolveFilterOptions, resolveGeneratorSettings } from "../src/options.js";

describe("resolveFilterOptions", () => {
  it("resolves a missing selection to no filter", () => {
    expect(resolveFilterOptions(undefined)).toEqual({ type: "none" });
  });

  it("fills pruning defaults", () => {
    expect(resolveFilterOptions({ type: "pruning" })).toEqual({
      type: "pruning",
      threshold: 0.48,
      thresholdType: "fixed",
      minWordThreshold: 0,
    });
  });

  it("clamps out-of-range pruning values instead of rejecting them", () => {
    expect(resolveFilterOptions({ type: "pruning", threshold: -1, minWordThreshold: 2.7 })).toEqual({
      type: "pruning",
      threshold: 0,
      thresholdType: "fixed",
      minWordThreshold: 2,
    });
    expect(resolveFilterOptions({ type: "pruning", threshold: 3, thresholdType: "dynamic" })).toEqual({
      type: "pruning",
      threshold: 1,
      thresholdType: "dynamic",
      minWordThreshold: 0,
    });
  });

  it("replaces non-finite numbers with defaults", () => {
    expect(resolveFilterOptions({ type: "bm25", threshold: Number.NaN, k1: Infinity })).toEqual({
      type: "bm25",
      query: "",
      threshold: 1,
      k1: 1.2,
      b: 0.75,
    });
  });

  it("clamps BM25 parameters", () => {
    expect(resolveFilterOptions({ type: "bm25", query: "rain", k1: -1, b: 2 })).toEqual({
      type: "bm25",
      query: "rain",
      threshold: 1,
      k1: 0,
      b: 1,
    });
  });

  it("warns and falls back to no filter for an unknown filter type", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(resolveFilterOptions({ type: "magic" })).toEqual({ type: "none" });
    expect(warnSpy).toHaveBeenCalledWith(
      "FilterOptions: falling back to no filter.",
      expect.objectContaining({ name: "ConversionError", code: "ERR_INVALID_OPTIONS" })
    );
    warnSpy.mockRestore();
  });
});

describe("resolveGeneratorSettings", () => {
  it("defaults every setting", () => {
    expect(resolveGeneratorSettings({})).toEqual({
      ignoreLinks: false,
      ignoreImages: false,
      maxContentLength: Infinity,
    });
  });

  it("treats a non-positive length limit as no limit", () => {
    expect(resolveGeneratorSettings({ ignoreLinks: true, maxContentLength: 0 })).toEqual({
      ignoreLinks: true,
      ignoreImages: false,
      maxContentLength: Infinity,
    });
  });
});
