import type { HTMLElement } from "node-html-parser";
import {
  BM25_FALLBACK_TOP_N,
  BM25_MAX_PARAGRAPH_QUERY_LENGTH,
  BM25_MIN_PARAGRAPH_QUERY_LENGTH,
} from "../constants.js";
import { normalizedText } from "../HtmlNormalizer.js";
import { Bm25Okapi, tokenize } from "../utils/bm25.js";
import type { ContentBlock, FilterOutcome, ResolvedBm25FilterOptions, ScoredBlock } from "../types.js";

/**
 * Query-driven relevance filter. Every block is one BM25 document in a corpus made of
 * the page's blocks.
 *
 * Blocks scoring at or above the threshold are kept. When none do, the
 * {@link BM25_FALLBACK_TOP_N} best blocks with a positive score are kept instead, so a
 * weakly matching page still yields something. A page where no block shares a term
 * with the query yields nothing.
 */
export class Bm25ContentFilter {
  constructor(private readonly options: ResolvedBm25FilterOptions) {}

  public filter(blocks: ReadonlyArray<ContentBlock>, query: string): FilterOutcome {
    const queryTokens = tokenize(query);
    const bm25 = new Bm25Okapi(
      blocks.map((block) => tokenize(block.text)),
      this.options.k1,
      this.options.b
    );
    const scores = queryTokens.length > 0 ? bm25.getScores(queryTokens) : blocks.map(() => 0);

    let keep = new Set(blocks.filter((_, i) => scores[i] >= this.options.threshold).map((block) => block.index));
    if (keep.size === 0) {
      keep = new Set(topPositive(blocks, scores, BM25_FALLBACK_TOP_N));
    }

    const scored: ScoredBlock[] = blocks.map((block, i) => ({
      ...block,
      score: scores[i],
      retained: keep.has(block.index),
    }));
    return { blocks: scored, retained: scored.filter((block) => block.retained) };
  }
}

function topPositive(blocks: ReadonlyArray<ContentBlock>, scores: number[], count: number): number[] {
  return blocks
    .map((block, i) => ({ index: block.index, score: scores[i] }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, count)
    .map((entry) => entry.index);
}

/**
 * Picks a query from the page when the caller gave none: the title, the meta
 * description, the meta keywords, the first h1, then the opening of the first paragraph
 * longer than fifty characters.
 */
export function derivePageQuery(document: HTMLElement): string {
  const candidates = [
    document.querySelector("title")?.textContent,
    document.querySelector("meta[name='description']")?.getAttribute("content"),
    document.querySelector("meta[name='keywords']")?.getAttribute("content"),
    document.querySelector("h1")?.textContent,
  ];
  for (const candidate of candidates) {
    const text = candidate?.trim();
    if (text) return text;
  }

  for (const paragraph of document.querySelectorAll("p")) {
    const text = normalizedText(paragraph);
    if (text.length > BM25_MIN_PARAGRAPH_QUERY_LENGTH) {
      return text.slice(0, BM25_MAX_PARAGRAPH_QUERY_LENGTH);
    }
  }
  return "";
}
