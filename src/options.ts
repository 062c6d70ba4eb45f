import { z } from "zod";
import {
  DEFAULT_BM25_B,
  DEFAULT_BM25_K1,
  DEFAULT_BM25_THRESHOLD,
  DEFAULT_MIN_WORD_THRESHOLD,
  DEFAULT_PRUNING_THRESHOLD,
} from "./constants.js";
import { ConversionError } from "./errors.js";
import type { ResolvedFilterOptions } from "./types.js";

// Non-finite or missing numbers take the default; finite ones are clamped, never rejected.
const clampedNumber = (fallback: number, min: number, max = Infinity) =>
  z
    .number()
    .finite()
    .catch(fallback)
    .transform((value) => Math.min(max, Math.max(min, value)));

const noFilterSchema = z.object({
  type: z.literal("none"),
});

const pruningFilterSchema = z.object({
  type: z.literal("pruning"),
  threshold: clampedNumber(DEFAULT_PRUNING_THRESHOLD, 0),
  thresholdType: z.enum(["fixed", "dynamic"]).catch("fixed"),
  minWordThreshold: clampedNumber(DEFAULT_MIN_WORD_THRESHOLD, 0).transform(Math.floor),
});

const bm25FilterSchema = z.object({
  type: z.literal("bm25"),
  query: z.string().catch(""),
  threshold: clampedNumber(DEFAULT_BM25_THRESHOLD, 0),
  k1: clampedNumber(DEFAULT_BM25_K1, 0),
  b: clampedNumber(DEFAULT_BM25_B, 0, 1),
});

export const filterOptionsSchema = z.discriminatedUnion("type", [noFilterSchema, pruningFilterSchema, bm25FilterSchema]);

export const generatorOptionsSchema = z.object({
  ignoreLinks: z.boolean().catch(false),
  ignoreImages: z.boolean().catch(false),
  maxContentLength: z.number().positive().catch(Infinity),
});

export type ResolvedGeneratorSettings = z.infer<typeof generatorOptionsSchema>;

/**
 * Validates filter options and clamps out-of-range values to the nearest valid bound.
 * Options that cannot be interpreted at all resolve to `{ type: "none" }`.
 */
export function resolveFilterOptions(options: unknown): ResolvedFilterOptions {
  const parsed = filterOptionsSchema.safeParse(options ?? { type: "none" });
  if (!parsed.success) {
    const error = new ConversionError(
      `Invalid filter options: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
      "ERR_INVALID_OPTIONS"
    );
    console.warn("FilterOptions: falling back to no filter.", error.toObject());
    return { type: "none" };
  }

  const resolved = parsed.data;
  // A dynamic threshold is a fraction of the best score on the page.
  if (resolved.type === "pruning" && resolved.thresholdType === "dynamic") {
    return { ...resolved, threshold: Math.min(1, resolved.threshold) };
  }
  return resolved;
}

export function resolveGeneratorSettings(options: unknown): ResolvedGeneratorSettings {
  const parsed = generatorOptionsSchema.safeParse(options ?? {});
  return parsed.success ? parsed.data : { ignoreLinks: false, ignoreImages: false, maxContentLength: Infinity };
}
