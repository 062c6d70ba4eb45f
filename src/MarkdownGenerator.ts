import { parse } from "node-html-parser";
import type { HTMLElement } from "node-html-parser";
import { CLEANING_POLICY, REFERENCES_HEADING } from "./constants.js";
import { ConversionError } from "./errors.js";
import { applyContentFilter } from "./filters/ContentFilter.js";
import { blockHtml, countWords } from "./filters/content-blocks.js";
import { HtmlNormalizer, normalizedText } from "./HtmlNormalizer.js";
import { resolveGeneratorSettings } from "./options.js";
import type {
  Citation,
  ConversionOutput,
  FilterOutcome,
  GenerateInput,
  MarkdownGeneratorOptions,
  MarkdownResult,
  NormalizedDocument,
} from "./types.js";
import { MarkdownConverter, escapeLinkDestination } from "./utils/markdown-converter.js";

/**
 * Turns rendered HTML into a {@link MarkdownResult}: normalize, filter, convert.
 *
 * Stateless between calls. Nothing is thrown across `generate`: a failing stage is
 * logged and degrades to an empty value.
 */
export class MarkdownGenerator {
  private readonly options: Required<MarkdownGeneratorOptions>;
  private readonly normalizer: HtmlNormalizer;

  private static readonly DEFAULT_OPTIONS: Required<MarkdownGeneratorOptions> = {
    ignoreLinks: false,
    ignoreImages: false,
    maxContentLength: Infinity,
    policy: CLEANING_POLICY,
  };

  /**
   * Creates an instance of MarkdownGenerator.
   * @param options Conversion options shared by every call.
   */
  constructor(options: MarkdownGeneratorOptions = {}) {
    const settings = resolveGeneratorSettings({ ...MarkdownGenerator.DEFAULT_OPTIONS, ...options });
    this.options = { ...settings, policy: options.policy ?? MarkdownGenerator.DEFAULT_OPTIONS.policy };
    this.normalizer = new HtmlNormalizer(this.options.policy);
  }

  /**
   * Converts one page.
   *
   * @param html Already-rendered page markup; may be empty or malformed.
   * @param input Source URL, optional query and filter selection.
   */
  public generate(html: string, input: GenerateInput = {}): MarkdownResult {
    const normalized = this.normalize(html);
    const outcome = this.filter(normalized, input);
    const converter = new MarkdownConverter({
      baseUrl: input.url,
      ignoreLinks: this.options.ignoreLinks,
      ignoreImages: this.options.ignoreImages,
      maxContentLength: this.options.maxContentLength,
    });

    const raw = this.convert(converter, normalized.content.outerHTML);
    const title = extractTitle(normalized.document);
    const referencesMarkdown = formatReferences(raw.citations);

    if (!outcome) {
      return Object.freeze<MarkdownResult>({
        rawMarkdown: raw.markdown,
        title,
        referencesMarkdown,
        wordCount: countWords(raw.markdown),
      });
    }

    const fitHtml = outcome.retained.map(blockHtml).join("\n");
    const fitMarkdown = this.convert(converter, fitHtml).markdown;
    return Object.freeze<MarkdownResult>({
      rawMarkdown: raw.markdown,
      fitMarkdown,
      fitHtml,
      title,
      referencesMarkdown,
      wordCount: countWords(fitMarkdown),
    });
  }

  private normalize(html: string): NormalizedDocument {
    try {
      return this.normalizer.normalize(html);
    } catch (error: unknown) {
      const wrapped = ConversionError.from(error, "ERR_NORMALIZE", "HTML normalization failed");
      console.error("MarkdownGenerator: Normalization failed, continuing with an empty document.", wrapped.toObject());
      const empty = parse("");
      return { document: empty, content: empty };
    }
  }

  private filter(normalized: NormalizedDocument, input: GenerateInput): FilterOutcome | null {
    try {
      return applyContentFilter(normalized, input.filter, input.query);
    } catch (error: unknown) {
      const wrapped = ConversionError.from(error, "ERR_FILTER", "Content filtering failed");
      console.error("MarkdownGenerator: Filtering failed, fit output will be empty.", wrapped.toObject());
      return input.filter && input.filter.type !== "none" ? { blocks: [], retained: [] } : null;
    }
  }

  private convert(converter: MarkdownConverter, html: string): ConversionOutput {
    try {
      return converter.convert(html);
    } catch (error: unknown) {
      const wrapped = ConversionError.from(error, "ERR_MARKDOWN", "Markdown conversion failed");
      console.error("MarkdownGenerator: Markdown conversion failed, returning empty Markdown.", wrapped.toObject());
      return { markdown: "", citations: [] };
    }
  }
}

/**
 * Text of the first h1 in document order, else the `<title>`, else undefined.
 */
export function extractTitle(document: HTMLElement): string | undefined {
  for (const selector of ["h1", "title"]) {
    const element = document.querySelector(selector);
    const text = element ? normalizedText(element) : "";
    if (text) return text;
  }
  return undefined;
}

/**
 * `## References` followed by one `[n] [text](url)` line per citation.
 */
export function formatReferences(citations: ReadonlyArray<Citation>): string | undefined {
  if (citations.length === 0) return undefined;
  const lines = citations.map(
    (citation) => `[${citation.index}] [${citation.text}](${escapeLinkDestination(citation.url)})`
  );
  return [REFERENCES_HEADING, "", ...lines].join("\n");
}

/**
 * Converts one page with a throwaway {@link MarkdownGenerator}.
 */
export function generateMarkdown(
  html: string,
  input: GenerateInput = {},
  options: MarkdownGeneratorOptions = {}
): MarkdownResult {
  return new MarkdownGenerator(options).generate(html, input);
}
