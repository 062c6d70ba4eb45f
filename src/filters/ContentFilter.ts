import { resolveFilterOptions } from "../options.js";
import type { FilterOptions, FilterOutcome, NormalizedDocument } from "../types.js";
import { Bm25ContentFilter, derivePageQuery } from "./Bm25ContentFilter.js";
import { extractContentBlocks } from "./content-blocks.js";
import { PruningContentFilter } from "./PruningContentFilter.js";

/**
 * Runs the filter selected by `options` over the normalized document.
 *
 * This is the single dispatch point over the filter union. `none` keeps the page as it
 * is and returns `null`, which tells the generator to skip fit output.
 *
 * @param query Used by BM25 when its options carry no query of their own.
 */
export function applyContentFilter(
  normalized: NormalizedDocument,
  options: FilterOptions | undefined,
  query?: string
): FilterOutcome | null {
  const resolved = resolveFilterOptions(options);

  switch (resolved.type) {
    case "none":
      return null;
    case "pruning":
      return new PruningContentFilter(resolved).filter(extractContentBlocks(normalized.content));
    case "bm25": {
      const effectiveQuery =
        resolved.query.trim() || query?.trim() || derivePageQuery(normalized.document);
      return new Bm25ContentFilter(resolved).filter(extractContentBlocks(normalized.content), effectiveQuery);
    }
    default: {
      const exhaustive: never = resolved;
      return exhaustive;
    }
  }
}

