import { HTMLElement, TextNode } from "node-html-parser";
import { HEADING_TAGS, INLINE_TAGS, LEAF_BLOCK_TAGS, REGEX_WHITESPACE_RUN } from "../constants.js";
import { normalizedText, tagOf } from "../HtmlNormalizer.js";
import type { BlockNode, ContentBlock } from "../types.js";

interface Atom {
  nodes: BlockNode[];
  tagName: string;
  /** Element the atom's nodes hang from. */
  parent: HTMLElement | null;
}

/**
 * Splits the content subtree into retain/drop units in document order.
 *
 * Leaf block tags (paragraphs, headings, lists, tables, ...) are atomic. A container
 * holding only text and inline children is atomic as well. A container that mixes
 * both yields one block per run of direct text and inline children, and its
 * block-level children are walked. Units without text are skipped.
 *
 * A run of sibling headings is grouped with the block that follows it when that block
 * has the same parent, so a heading is kept or dropped together with the content it
 * introduces. Otherwise the run is a block of its own.
 */
export function extractContentBlocks(content: HTMLElement): ContentBlock[] {
  const atoms: Atom[] = [];
  collectAtoms(content, atoms);

  const blocks: ContentBlock[] = [];
  let headings: Atom[] = [];
  const flushHeadings = (): void => {
    if (headings.length === 0) return;
    const nodes = headings.flatMap((heading) => heading.nodes);
    blocks.push(measureBlock(blocks.length, nodes, headings[0].tagName, content));
    headings = [];
  };

  for (const atom of atoms) {
    if (headings.length > 0 && headings[0].parent !== atom.parent) {
      flushHeadings();
    }
    if (HEADING_TAGS.has(atom.tagName)) {
      headings.push(atom);
      continue;
    }
    const nodes = [...headings.flatMap((heading) => heading.nodes), ...atom.nodes];
    blocks.push(measureBlock(blocks.length, nodes, atom.tagName, content));
    headings = [];
  }
  flushHeadings();
  return blocks;
}

function collectAtoms(element: HTMLElement, atoms: Atom[]): void {
  const tagName = tagOf(element);
  if (LEAF_BLOCK_TAGS.has(tagName) || !element.childNodes.some(isBlockChild)) {
    if (normalizedText(element)) {
      atoms.push({ nodes: [element], tagName, parent: element.parentNode });
    }
    return;
  }

  let run: BlockNode[] = [];
  const flushRun = (): void => {
    if (run.some((node) => normalizedText(node).length > 0)) {
      atoms.push({ nodes: run, tagName, parent: element });
    }
    run = [];
  };

  for (const child of element.childNodes) {
    if (child instanceof TextNode) {
      run.push(child);
    } else if (child instanceof HTMLElement) {
      if (isBlockChild(child)) {
        flushRun();
        collectAtoms(child, atoms);
      } else {
        run.push(child);
      }
    }
  }
  flushRun();
}

function isBlockChild(node: unknown): boolean {
  return node instanceof HTMLElement && !INLINE_TAGS.has(tagOf(node));
}

function measureBlock(index: number, nodes: BlockNode[], tagName: string, contentRoot: HTMLElement): ContentBlock {
  const text = nodes
    .map((node) => normalizedText(node))
    .filter(Boolean)
    .join(" ");
  const linkTextLength = nodes.reduce((sum, node) => sum + linkTextLengthOf(node), 0);

  return {
    index,
    nodes,
    tagName,
    text,
    textLength: text.length,
    linkTextLength: Math.min(linkTextLength, text.length),
    wordCount: countWords(text),
    classIdContext: classIdContextOf(nodes, contentRoot),
  };
}

function linkTextLengthOf(node: BlockNode): number {
  if (!(node instanceof HTMLElement)) {
    return 0;
  }
  if (tagOf(node) === "a") {
    return normalizedText(node).length;
  }
  return node
    .querySelectorAll("a")
    .reduce((sum, link) => sum + normalizedText(link).length, 0);
}

// Class names and ids from each node up to, but excluding, the content root.
function classIdContextOf(nodes: BlockNode[], contentRoot: HTMLElement): string {
  const parts = new Set<string>();
  for (const node of nodes) {
    let current: HTMLElement | null = node instanceof HTMLElement ? node : node.parentNode;
    while (current && current !== contentRoot) {
      const className = current.getAttribute("class");
      const id = current.getAttribute("id");
      if (className) parts.add(className.toLowerCase());
      if (id) parts.add(id.toLowerCase());
      current = current.parentNode;
    }
  }
  return [...parts].join(" ");
}

/**
 * Markup of a block's nodes. Block elements go on their own lines; the pieces of a
 * text run are joined as they stood in the source.
 */
export function blockHtml(block: ContentBlock): string {
  return block.nodes
    .map((node, i) => (i > 0 && isBlockChild(node) && isBlockChild(block.nodes[i - 1]) ? "\n" : "") + node.toString())
    .join("");
}

/**
 * Whitespace-delimited token count.
 */
export function countWords(text: string): number {
  return text.split(REGEX_WHITESPACE_RUN).filter(Boolean).length;
}
