import { parse, HTMLElement, TextNode } from "node-html-parser";
import { CLEANING_POLICY, REGEX_CONTROL_CHARACTERS, REGEX_WHITESPACE_RUN } from "./constants.js";
import type { CleaningPolicy, NormalizedDocument } from "./types.js";

const PARSE_OPTIONS = {
  lowerCaseTagName: false,
  comment: false,
  blockTextElements: { script: true, style: true, noscript: true },
};

/**
 * Parses raw HTML, strips everything that is not content and isolates the main-content region.
 *
 * Every method is deterministic and never throws for malformed or empty markup.
 */
export class HtmlNormalizer {
  private readonly policy: CleaningPolicy;

  constructor(policy: CleaningPolicy = CLEANING_POLICY) {
    this.policy = policy;
  }

  /**
   * Cleans the document and selects its main content.
   * @param html Raw, possibly malformed, HTML.
   */
  public normalize(html: string): NormalizedDocument {
    const document = this.parseAndClean(html);
    const content = this.selectMainContent(document);
    return { document, content };
  }

  /**
   * Returns the cleaned body markup without main-content selection.
   */
  public clean(html: string): string {
    const document = this.parseAndClean(html);
    const body = document.querySelector("body");
    return (body ?? document).innerHTML;
  }

  /**
   * Extracts plain text, one trimmed line per block, with inline formatting unwrapped.
   */
  public extractText(html: string): string {
    const document = this.parseAndClean(html);
    const root = document.querySelector("body") ?? document;
    this.unwrapInlineTags(root);

    return root.structuredText
      .split("\n")
      .map((line) => line.replace(REGEX_WHITESPACE_RUN, " ").trim())
      .filter((line) => line.length > 0)
      .join("\n");
  }

  private parseAndClean(html: string): HTMLElement {
    const input = typeof html === "string" ? html.replace(REGEX_CONTROL_CHARACTERS, "") : "";
    if (!input.trim()) {
      return parse("", PARSE_OPTIONS);
    }

    // comment: false drops comment nodes while parsing
    const root = parse(input, PARSE_OPTIONS);

    this.removeWhere(root, (element) => this.policy.removeTags.has(tagOf(element)));
    this.removeWhere(root, isHidden);
    this.normalizeTablesForMarkdown(root);
    return root;
  }

  private selectMainContent(document: HTMLElement): HTMLElement {
    for (const selector of this.policy.mainContentSelectors) {
      const match = safeQuerySelector(document, selector);
      if (match) {
        return match;
      }
    }

    const body = document.querySelector("body") ?? document;
    for (const selector of this.policy.fallbackRemoveSelectors) {
      safeQuerySelectorAll(body, selector).forEach((element) => element.remove());
    }
    return body;
  }

  // Collects first so removal does not disturb the walk. Descendants of a removed
  // element are skipped.
  private removeWhere(root: HTMLElement, predicate: (element: HTMLElement) => boolean): void {
    const doomed: HTMLElement[] = [];
    const visit = (element: HTMLElement): void => {
      for (const child of element.childNodes) {
        if (!(child instanceof HTMLElement)) continue;
        if (predicate(child)) {
          doomed.push(child);
        } else {
          visit(child);
        }
      }
    };
    visit(root);
    doomed.forEach((element) => element.remove());
  }

  // Splices the children of each unwrap-set element into its parent at the same position.
  private unwrapInlineTags(root: HTMLElement): void {
    const visit = (element: HTMLElement): void => {
      for (const child of [...element.childNodes]) {
        if (!(child instanceof HTMLElement)) continue;
        visit(child);
        if (this.policy.unwrapTags.has(tagOf(child))) {
          child.replaceWith(...child.childNodes);
        }
      }
    };
    visit(root);
  }

  /**
   * Promotes the first row of a header-less data table to header cells so the GFM table
   * rule can convert it. Layout tables (role="presentation") are left alone.
   */
  private normalizeTablesForMarkdown(root: HTMLElement): void {
    for (const table of root.querySelectorAll("table")) {
      const role = table.getAttribute("role");
      if (role && role.toLowerCase() === "presentation") continue;
      if (table.querySelector("th")) continue;
      if (table.querySelector("[colspan], [rowspan]")) continue;

      const firstRow = table.querySelector("tr");
      if (!firstRow) continue;
      for (const cell of firstRow.querySelectorAll("td")) {
        if (cell.parentNode !== firstRow) continue;
        cell.replaceWith(`<th>${cell.innerHTML}</th>`);
      }
    }
  }
}

export function tagOf(element: HTMLElement): string {
  return (element.rawTagName ?? "").toLowerCase();
}

/**
 * True for inline `display:none`, a `hidden` attribute, or `aria-hidden="true"`.
 */
export function isHidden(element: HTMLElement): boolean {
  const style = element.getAttribute("style");
  if (style && style.replace(REGEX_WHITESPACE_RUN, "").toLowerCase().includes("display:none")) {
    return true;
  }
  if (element.hasAttribute("hidden")) {
    return true;
  }
  return element.getAttribute("aria-hidden") === "true";
}

/**
 * Collapsed, trimmed text of a node.
 */
export function normalizedText(node: HTMLElement | TextNode): string {
  return node.textContent.replace(REGEX_WHITESPACE_RUN, " ").trim();
}

function safeQuerySelector(root: HTMLElement, selector: string): HTMLElement | null {
  try {
    return root.querySelector(selector);
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    console.warn(`HtmlNormalizer: Skipping invalid selector '${selector}': ${message}`);
    return null;
  }
}

function safeQuerySelectorAll(root: HTMLElement, selector: string): HTMLElement[] {
  try {
    return root.querySelectorAll(selector);
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    console.warn(`HtmlNormalizer: Skipping invalid selector '${selector}': ${message}`);
    return [];
  }
}
