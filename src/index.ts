import { MarkdownGenerator, generateMarkdown, extractTitle, formatReferences } from "./MarkdownGenerator.js";
import { HtmlNormalizer } from "./HtmlNormalizer.js";
import type {
  CleaningPolicy,
  NormalizedDocument,
  BlockNode,
  ContentBlock,
  ScoredBlock,
  FilterOptions,
  NoFilterOptions,
  PruningFilterOptions,
  Bm25FilterOptions,
  ThresholdType,
  FilterOutcome,
  MarkdownGeneratorOptions,
  GenerateInput,
  Citation,
  ConversionOutput,
  MarkdownResult,
} from "./types.js";

export type {
  CleaningPolicy,
  NormalizedDocument,
  BlockNode,
  ContentBlock,
  ScoredBlock,
  FilterOptions,
  NoFilterOptions,
  PruningFilterOptions,
  Bm25FilterOptions,
  ThresholdType,
  FilterOutcome,
  MarkdownGeneratorOptions,
  GenerateInput,
  Citation,
  ConversionOutput,
  MarkdownResult,
};
export { MarkdownGenerator, generateMarkdown, extractTitle, formatReferences };
export { HtmlNormalizer };
export { applyContentFilter } from "./filters/ContentFilter.js";
export { extractContentBlocks } from "./filters/content-blocks.js";
export { PruningContentFilter } from "./filters/PruningContentFilter.js";
export { Bm25ContentFilter, derivePageQuery } from "./filters/Bm25ContentFilter.js";
export { Bm25Okapi, tokenize } from "./utils/bm25.js";
export { MarkdownConverter } from "./utils/markdown-converter.js";
export type { ConversionContext } from "./utils/markdown-converter.js";
export { resolveFilterOptions } from "./options.js";
export { ConversionError } from "./errors.js";
export type { ConversionErrorCode, ConversionErrorDetails } from "./errors.js";
export { CLEANING_POLICY, BM25_FALLBACK_TOP_N } from "./constants.js";
