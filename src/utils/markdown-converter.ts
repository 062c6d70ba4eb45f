import TurndownService from "turndown";
import { gfm } from "turndown-plugin-gfm";
import {
  CODE_BLOCK_LANG_PREFIXES,
  POSTPROCESSING_MAX_CONSECUTIVE_NEWLINES,
  REGEX_URL_SCHEME,
  REGEX_WHITESPACE_RUN,
  TRUNCATION_MARKER,
} from "../constants.js";
import type { Citation, ConversionOutput } from "../types.js";

// --- Constants ---

const DEFAULT_ORDERED_LIST_ITEM_PREFIX = "1. ";
const NESTED_LIST_INDENT = "  ";
const REGEX_JAVASCRIPT_HREF = /^\s*javascript:/i;
const REGEX_FENCE_OPEN = /^(`{3,}|~{3,})/;
const REGEX_BACKTICK_RUN = /`+/g;
const REGEX_LINK_DESTINATION_SPECIALS = /([<>()])/g;

const UNWANTED_TAGS: Array<keyof HTMLElementTagNameMap> = [
  "script",
  "style",
  "noscript",
  "iframe",
  "button",
  "input",
  "select",
  "textarea",
  "form",
  "canvas",
  "audio",
  "video",
];

// --- Types ---

export interface ConversionContext {
  /** Base for relative link and image URLs. */
  baseUrl?: string;
  /** Render anchors as text and record no citations. */
  ignoreLinks?: boolean;
  ignoreImages?: boolean;
  /** Maximum length of the final Markdown content. Defaults to Infinity. */
  maxContentLength?: number;
}

/**
 * Escapes a URL for use as a Markdown link destination. Destinations with spaces are
 * wrapped in angle brackets.
 */
export function escapeLinkDestination(url: string): string {
  const escaped = url.replace(REGEX_LINK_DESTINATION_SPECIALS, "\\$1");
  return escaped.includes(" ") ? `<${escaped}>` : escaped;
}

// --- Class Definition ---

/**
 * Tree-to-Markdown conversion on top of Turndown, with citation bookkeeping.
 *
 * Anchors render inline as `[text](url)`; each distinct URL also gets a citation
 * number in first-occurrence order. Citations are collected per {@link convert} call.
 */
export class MarkdownConverter {
  private readonly turndownService: TurndownService;
  private readonly context: ConversionContext;
  private citations = new Map<string, Citation>();

  constructor(context: ConversionContext = {}) {
    this.context = context;
    this.turndownService = new TurndownService({
      headingStyle: "atx",
      codeBlockStyle: "fenced",
      bulletListMarker: "-",
      strongDelimiter: "**",
      emDelimiter: "*",
      hr: "---",
      // Elements Turndown keeps as raw HTML (e.g. tables the GFM plugin cannot express)
      // are flattened to their converted content instead.
      keepReplacement: (content: string) => `\n\n${content}\n\n`,
    });

    this.turndownService.use(gfm);

    this.setupPrioritizedRules();
  }

  // --- Public Method ---

  /**
   * Converts an HTML string to Markdown and reports the links it cited.
   */
  public convert(html: string): ConversionOutput {
    this.citations = new Map();
    const markdown = html.trim() ? this.turndownService.turndown(html) : "";
    return {
      markdown: this.postprocessMarkdown(markdown),
      citations: [...this.citations.values()],
    };
  }

  // --- Turndown Rule Setup ---

  private setupPrioritizedRules(): void {
    this.turndownService.addRule("remove-unwanted", {
      filter: UNWANTED_TAGS,
      replacement: () => "",
    });
    this.addBlockRules();
    this.addInlineRules();
  }

  private addBlockRules(): void {
    this.turndownService.addRule("list", {
      filter: ["ul", "ol"],
      replacement: (content, node) => {
        const body = content.replace(/^\n+/, "").replace(/\n+$/, "");
        if (node.parentNode && node.parentNode.nodeName === "LI") {
          return `\n${body}\n`;
        }
        return `\n\n${body}\n\n`;
      },
    });

    this.turndownService.addRule("listItem", {
      filter: "li",
      replacement: (content, node, options) => {
        const body = content.replace(/^\s+/, "").replace(/\n+$/, "");

        let prefix = `${options.bulletListMarker ?? "-"} `;
        const parent = node.parentElement;
        if (parent && parent.nodeName === "OL") {
          const start = Number(parent.getAttribute("start") ?? 1);
          const index = Array.prototype.indexOf.call(parent.children, node);
          prefix =
            index >= 0 ? `${(Number.isInteger(start) ? start : 1) + index}. ` : DEFAULT_ORDERED_LIST_ITEM_PREFIX;
        }

        // Nested lists and further paragraphs are indented by two spaces per level.
        const indented = body
          .split("\n")
          .map((line, i) => (i > 0 && line ? NESTED_LIST_INDENT + line : line))
          .join("\n");
        return `${prefix}${indented}\n`;
      },
    });

    this.turndownService.addRule("blockquote", {
      filter: "blockquote",
      replacement: (content) => {
        const trimmedContent = content.trim();
        if (!trimmedContent) return "";
        return "\n\n> " + trimmedContent.replace(/\n/g, "\n> ") + "\n\n";
      },
    });

    // Any <pre> becomes a fenced block holding its text verbatim.
    this.turndownService.addRule("code-block", {
      filter: "pre",
      replacement: (_content, node) => {
        const code = (node.textContent ?? "").replace(/\n$/, "");
        const codeElement = node.querySelector("code");

        let language =
          node.getAttribute("lang") ||
          node.getAttribute("language") ||
          codeElement?.getAttribute("lang") ||
          codeElement?.getAttribute("language") ||
          "";

        if (!language) {
          const classes = `${node.className} ${codeElement?.className ?? ""}`.split(" ").filter(Boolean);
          for (const cls of classes) {
            const prefix = CODE_BLOCK_LANG_PREFIXES.find((candidate) => cls.startsWith(candidate));
            if (prefix) {
              language = cls.substring(prefix.length);
              break;
            }
          }
        }

        const longestRun = Math.max(0, ...(code.match(REGEX_BACKTICK_RUN) ?? []).map((run) => run.length));
        const fence = "`".repeat(Math.max(3, longestRun + 1));
        return `\n\n${fence}${language}\n${code}\n${fence}\n\n`;
      },
    });
  }

  private addInlineRules(): void {
    this.turndownService.addRule("link", {
      filter: (node) => node.nodeName === "A" && !!node.getAttribute("href"),
      replacement: (content, node) => {
        const text = content.trim();
        const href = (node.getAttribute("href") ?? "").trim();
        if (this.context.ignoreLinks || REGEX_JAVASCRIPT_HREF.test(href)) {
          return text;
        }

        const url = this.resolveUrl(href);
        const label = (text || this.turndownService.escape(url)).replace(REGEX_WHITESPACE_RUN, " ");
        this.cite(url, label);
        return `[${label}](${escapeLinkDestination(url)})`;
      },
    });

    this.turndownService.addRule("image", {
      filter: "img",
      replacement: (_content, node) => {
        const src = (node.getAttribute("src") ?? "").trim();
        if (this.context.ignoreImages || !src) return "";
        const alt = (node.getAttribute("alt") ?? "").replace(REGEX_WHITESPACE_RUN, " ").trim();
        return `![${this.turndownService.escape(alt)}](${escapeLinkDestination(this.resolveUrl(src))})`;
      },
    });

    this.turndownService.addRule("inlineCode", {
      filter: (node) => node.nodeName === "CODE" && node.parentNode?.nodeName !== "PRE",
      replacement: (content) => {
        const trimmed = content.trim();
        if (!trimmed) return "";

        let delimiter = "`";
        if (trimmed.includes("`")) {
          delimiter = "``";
          if (trimmed.startsWith("`") || trimmed.endsWith("`")) {
            return `${delimiter} ${trimmed} ${delimiter}`;
          }
        }
        return delimiter + trimmed + delimiter;
      },
    });
  }

  // --- Links ---

  private cite(url: string, text: string): void {
    if (!this.citations.has(url)) {
      this.citations.set(url, { index: this.citations.size + 1, url, text });
    }
  }

  // Absolute URLs are kept verbatim; relative ones are resolved against the base URL.
  private resolveUrl(href: string): string {
    if (REGEX_URL_SCHEME.test(href)) return href;

    const { baseUrl } = this.context;
    if (!baseUrl) {
      return href.startsWith("//") ? `https:${href}` : href;
    }
    try {
      return new URL(href, baseUrl).href;
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      console.warn(`MarkdownConverter: Could not resolve '${href}' against '${baseUrl}': ${message}`);
      return href;
    }
  }

  // --- Markdown Postprocessing ---

  private postprocessMarkdown(markdown: string): string {
    const lines: string[] = [];
    let openFence: string | null = null;
    let newlineRun = 0;

    for (const line of markdown.split("\n")) {
      const fence = REGEX_FENCE_OPEN.exec(line.trimStart());
      if (openFence) {
        // Code is kept byte for byte until the matching closing fence.
        if (fence && line.trim() === fence[1] && fence[1].startsWith(openFence)) {
          openFence = null;
        }
        lines.push(line);
        continue;
      }
      if (fence) {
        openFence = fence[1];
        newlineRun = 0;
        lines.push(line.trimEnd());
        continue;
      }

      const trimmed = line.trimEnd();
      if (!trimmed) {
        newlineRun++;
        if (newlineRun < POSTPROCESSING_MAX_CONSECUTIVE_NEWLINES) lines.push("");
        continue;
      }
      newlineRun = 0;
      lines.push(trimmed);
    }

    let processed = lines.join("\n").trim();

    const { maxContentLength } = this.context;
    if (maxContentLength && processed.length > maxContentLength) {
      // Try to truncate at a sentence boundary
      const truncatedPoint = processed.lastIndexOf(".", maxContentLength - 15);
      const sliceEnd = truncatedPoint > maxContentLength / 2 ? truncatedPoint + 1 : maxContentLength;
      processed = processed.slice(0, sliceEnd) + TRUNCATION_MARKER;
    }

    return processed;
  }
}
