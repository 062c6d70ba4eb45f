import { describe, it, expect } from "vitest";
import { inspect } from "node:util";
import { ConversionError } from "../src/errors.js";

describe("ConversionError", () => {
  it("wraps a thrown error with the stage code", () => {
    const error = ConversionError.from(new TypeError("boom"), "ERR_FILTER", "Content filtering failed");

    expect(error).toBeInstanceOf(ConversionError);
    expect(error.message).toBe("Content filtering failed: boom");
    expect(error.code).toBe("ERR_FILTER");
    expect(error.originalError).toBeInstanceOf(TypeError);
  });

  it("returns an existing ConversionError unchanged", () => {
    const original = new ConversionError("already wrapped", "ERR_MARKDOWN");
    expect(ConversionError.from(original, "ERR_FILTER", "ignored")).toBe(original);
  });

  it("wraps thrown non-errors", () => {
    const error = ConversionError.from("plain string", "ERR_NORMALIZE", "HTML normalization failed");
    expect(error.message).toBe("HTML normalization failed: plain string");
    expect(error.originalError?.message).toBe("plain string");
  });

  it("serializes to a plain object for logging", () => {
    const error = ConversionError.from(new Error("boom"), "ERR_MARKDOWN", "Markdown conversion failed");
    const expected = {
      name: "ConversionError",
      message: "Markdown conversion failed: boom",
      code: "ERR_MARKDOWN",
      originalError: { name: "Error", message: "boom" },
    };

    expect(error.toObject()).toEqual(expected);
    expect(JSON.parse(JSON.stringify(error))).toEqual(expected);
    expect(inspect(error)).toContain("ERR_MARKDOWN");
  });

  it("keeps string and numeric codes of the original error", () => {
    const cause = Object.assign(new Error("denied"), { code: "EACCES" });
    const error = ConversionError.from(cause, "ERR_NORMALIZE", "HTML normalization failed");
    expect(error.toObject().originalError).toEqual({ name: "Error", message: "denied", code: "EACCES" });
  });
});
