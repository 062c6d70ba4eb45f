import type { HTMLElement, TextNode } from "node-html-parser";

/**
 * Process-wide rules describing which markup is noise and where the main content lives.
 */
export interface CleaningPolicy {
  /** Tags removed together with their subtree. */
  readonly removeTags: ReadonlySet<string>;
  /** Tags replaced by their children on the plain-text path. */
  readonly unwrapTags: ReadonlySet<string>;
  /** Main-content selectors, highest priority first. */
  readonly mainContentSelectors: ReadonlyArray<string>;
  /** Selectors stripped from the body when no main-content selector matches. */
  readonly fallbackRemoveSelectors: ReadonlyArray<string>;
}

/**
 * Output of the normalizer.
 */
export interface NormalizedDocument {
  /** The whole cleaned document, including `<head>` for title and meta lookups. */
  readonly document: HTMLElement;
  /** The main-content subtree (the parse root for empty input). */
  readonly content: HTMLElement;
}

/**
 * A source node of a content block: a block element, or a piece of a text run.
 */
export type BlockNode = HTMLElement | TextNode;

/**
 * A retain/drop unit measured from the normalized tree.
 */
export interface ContentBlock {
  /** Position in document order. */
  readonly index: number;
  /** Source subtrees. A heading run is grouped with the block that follows it. */
  readonly nodes: ReadonlyArray<BlockNode>;
  /** Lowercase tag of the block's body node, of its heading when it has none, or of the container holding a text run. */
  readonly tagName: string;
  /** Whitespace-collapsed text of all nodes. */
  readonly text: string;
  readonly textLength: number;
  /** Length of the text wrapped in anchors. */
  readonly linkTextLength: number;
  readonly wordCount: number;
  /** Lowercased class names and ids of the nodes and their ancestors inside the content root. */
  readonly classIdContext: string;
}

/**
 * A block after scoring. Filters create these once and never change them.
 */
export interface ScoredBlock extends ContentBlock {
  readonly score: number;
  readonly retained: boolean;
}

export type ThresholdType = "fixed" | "dynamic";

export interface NoFilterOptions {
  type: "none";
}

export interface PruningFilterOptions {
  type: "pruning";
  /**
   * Minimum composite score. Under `dynamic` it is a fraction of the page's best score.
   * @default 0.48
   */
  threshold?: number;
  /** @default "fixed" */
  thresholdType?: ThresholdType;
  /**
   * Blocks with fewer words are dropped whatever their score.
   * @default 0
   */
  minWordThreshold?: number;
}

export interface Bm25FilterOptions {
  type: "bm25";
  /** Falls back to the call's query, then to page metadata, when empty. */
  query?: string;
  /** @default 1.0 */
  threshold?: number;
  /** @default 1.2 */
  k1?: number;
  /** @default 0.75 */
  b?: number;
}

export type FilterOptions = NoFilterOptions | PruningFilterOptions | Bm25FilterOptions;

export type ResolvedPruningFilterOptions = Required<PruningFilterOptions>;
export type ResolvedBm25FilterOptions = Required<Bm25FilterOptions>;
export type ResolvedFilterOptions = NoFilterOptions | ResolvedPruningFilterOptions | ResolvedBm25FilterOptions;

/**
 * Result of running a filter over a normalized document.
 */
export interface FilterOutcome {
  /** Every candidate block in document order. */
  readonly blocks: ReadonlyArray<ScoredBlock>;
  /** The retained subset in document order. */
  readonly retained: ReadonlyArray<ScoredBlock>;
}

/**
 * Configuration for Markdown generation.
 */
export interface MarkdownGeneratorOptions {
  /**
   * Render anchors as plain text and record no citations.
   * @default false
   */
  ignoreLinks?: boolean;
  /**
   * Drop images from the output.
   * @default false
   */
  ignoreImages?: boolean;
  /** Maximum length of each Markdown output. Defaults to Infinity. */
  maxContentLength?: number;
  /** Cleaning policy handed to the normalizer. */
  policy?: CleaningPolicy;
}

/**
 * Per-call input besides the HTML itself.
 */
export interface GenerateInput {
  /** Source URL, used to resolve relative links and images. */
  url?: string;
  /** Query for BM25 when the filter options carry none. */
  query?: string;
  /** @default { type: "none" } */
  filter?: FilterOptions;
}

/**
 * A numbered link target collected during conversion.
 */
export interface Citation {
  readonly index: number;
  readonly url: string;
  readonly text: string;
}

export interface ConversionOutput {
  readonly markdown: string;
  readonly citations: ReadonlyArray<Citation>;
}

/**
 * Final value handed back to the caller.
 */
export interface MarkdownResult {
  /** Markdown of the whole normalized content tree. */
  readonly rawMarkdown: string;
  /** Markdown of the retained blocks; absent when no filter ran. */
  readonly fitMarkdown?: string;
  /** Markup of the retained blocks; present exactly when `fitMarkdown` is. */
  readonly fitHtml?: string;
  readonly title?: string;
  /** Numbered citation list, absent when the page has no links. */
  readonly referencesMarkdown?: string;
  /** Whitespace-token count of `fitMarkdown` when present, else of `rawMarkdown`. */
  readonly wordCount: number;
}
