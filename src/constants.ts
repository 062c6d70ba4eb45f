import type { CleaningPolicy } from "./types.js";

// --- Cleaning policy ---

const REMOVE_TAGS: ReadonlyArray<string> = [
  "script",
  "style",
  "noscript",
  "iframe",
  "svg",
  "canvas",
  "video",
  "audio",
  "form",
  "input",
  "button",
  "select",
  "textarea",
];

// Only applied on the plain-text path.
const UNWRAP_TAGS: ReadonlyArray<string> = ["span", "font", "b", "i", "u", "strong", "em"];

// Priority order matters: the first selector with a match wins.
const MAIN_CONTENT_SELECTORS: ReadonlyArray<string> = [
  "main",
  "article",
  "[role=main]",
  "#content",
  ".content",
  "#main",
  ".main",
];

const FALLBACK_REMOVE_SELECTORS: ReadonlyArray<string> = [
  "nav",
  "header",
  "footer",
  "aside",
  ".sidebar",
  "#sidebar",
  ".nav",
  ".menu",
];

export const CLEANING_POLICY: CleaningPolicy = Object.freeze({
  removeTags: new Set(REMOVE_TAGS),
  unwrapTags: new Set(UNWRAP_TAGS),
  mainContentSelectors: Object.freeze([...MAIN_CONTENT_SELECTORS]),
  fallbackRemoveSelectors: Object.freeze([...FALLBACK_REMOVE_SELECTORS]),
});

// --- Content blocks ---

export const LEAF_BLOCK_TAGS: ReadonlySet<string> = new Set([
  "p",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "pre",
  "blockquote",
  "table",
  "ul",
  "ol",
  "dl",
  "figure",
  "address",
  "details",
]);

export const HEADING_TAGS: ReadonlySet<string> = new Set(["h1", "h2", "h3", "h4", "h5", "h6"]);

// Children with these tags do not split a container into separate blocks.
export const INLINE_TAGS: ReadonlySet<string> = new Set([
  "a",
  "abbr",
  "b",
  "bdi",
  "bdo",
  "br",
  "cite",
  "code",
  "data",
  "del",
  "dfn",
  "em",
  "font",
  "i",
  "img",
  "ins",
  "kbd",
  "label",
  "mark",
  "q",
  "s",
  "samp",
  "small",
  "span",
  "strike",
  "strong",
  "sub",
  "sup",
  "time",
  "u",
  "var",
  "wbr",
]);

// --- Pruning ---

export const DEFAULT_PRUNING_THRESHOLD = 0.48;
export const DEFAULT_MIN_WORD_THRESHOLD = 0;

export const PRUNING_TAG_WEIGHTS: Readonly<Record<string, number>> = Object.freeze({
  article: 1.5,
  main: 1.4,
  section: 1.3,
  p: 1.2,
  h1: 1.4,
  h2: 1.3,
  h3: 1.2,
  h4: 1.1,
  h5: 1.0,
  h6: 0.9,
  blockquote: 1.1,
  pre: 1.1,
  table: 1.0,
  figure: 1.0,
  dl: 0.8,
  div: 0.7,
  span: 0.6,
  li: 0.5,
  ul: 0.5,
  ol: 0.5,
});
export const DEFAULT_TAG_WEIGHT = 0.5;
export const MAX_TAG_WEIGHT = 1.5;

// Characters of text at which a block of the tag counts as full-length prose.
export const PRUNING_LENGTH_BASELINES: Readonly<Record<string, number>> = Object.freeze({
  p: 120,
  h1: 30,
  h2: 30,
  h3: 30,
  h4: 30,
  h5: 30,
  h6: 30,
  li: 60,
  ul: 150,
  ol: 150,
  pre: 100,
  blockquote: 120,
  table: 200,
  article: 400,
  section: 400,
  main: 400,
  div: 160,
});
export const DEFAULT_LENGTH_BASELINE = 120;

export const PRUNING_METRIC_WEIGHTS = Object.freeze({
  tagWeight: 0.3,
  linkDensity: 0.3,
  classIdWeight: 0.2,
  textLength: 0.2,
});

// Matched as case-insensitive substrings of the class/id context.
export const NEGATIVE_CLASS_ID_KEYWORDS: ReadonlyArray<string> = Object.freeze([
  "nav",
  "footer",
  "sidebar",
  "comment",
  "menu",
  "header",
  "promo",
  "advert",
  "social",
  "share",
  "related",
  "widget",
  "banner",
  "breadcrumb",
  "sponsor",
  "ad",
]);

export const POSITIVE_CLASS_ID_KEYWORDS: ReadonlyArray<string> = Object.freeze([
  "content",
  "article",
  "main",
  "post",
  "entry",
  "text",
  "body",
  "story",
]);

// --- BM25 ---

export const DEFAULT_BM25_THRESHOLD = 1.0;
export const DEFAULT_BM25_K1 = 1.2;
export const DEFAULT_BM25_B = 0.75;
export const MIN_TOKEN_LENGTH = 2;

/** Blocks kept when no block reaches the BM25 threshold. */
export const BM25_FALLBACK_TOP_N = 3;

export const BM25_MIN_PARAGRAPH_QUERY_LENGTH = 50;
export const BM25_MAX_PARAGRAPH_QUERY_LENGTH = 200;

// --- Markdown ---

export const CODE_BLOCK_LANG_PREFIXES: ReadonlyArray<string> = ["language-", "lang-"];
export const POSTPROCESSING_MAX_CONSECUTIVE_NEWLINES = 2;
export const REFERENCES_HEADING = "## References";
export const TRUNCATION_MARKER = "... (truncated)";

// Regex
export const REGEX_CONTROL_CHARACTERS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;
export const REGEX_URL_SCHEME = /^[a-z][a-z0-9+.-]*:/i;
export const REGEX_WHITESPACE_RUN = /\s+/g;
