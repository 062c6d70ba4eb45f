import { describe, it, expect } from "vitest";
import {
  PruningContentFilter,
  classIdWeight,
  linkDensity,
  scoreBlock,
} from "../src/filters/PruningContentFilter.js";
import type { ContentBlock } from "../src/types.js";

let nextIndex = 0;

function block(overrides: Partial<ContentBlock>): ContentBlock {
  return {
    index: nextIndex++,
    nodes: [],
    tagName: "p",
    text: "",
    textLength: 0,
    linkTextLength: 0,
    wordCount: 20,
    classIdContext: "",
    ...overrides,
  };
}

// Scores 0.84: paragraph weight, no links, neutral class, full length.
const article = () => block({ tagName: "p", textLength: 120 });
// Scores 0.24: div weight, all links, "nav" class, half length.
const navigation = () => block({ tagName: "div", textLength: 80, linkTextLength: 80, classIdContext: "nav" });

describe("classIdWeight", () => {
  it.each([
    ["", 0.5],
    ["post-body", 1],
    ["site-header", 0],
    ["ad-slot", 0],
    ["adslot", 0],
    ["googleads", 0],
    ["topad", 0],
    ["TopAd Entry", 0],
    ["Post-Body", 1],
    ["intro", 0.5],
    ["comment-content", 0],
  ])("%s -> %s", (context, expected) => {
    expect(classIdWeight(context)).toBe(expected);
  });
});

describe("linkDensity", () => {
  it("is the share of text inside anchors", () => {
    expect(linkDensity(block({ textLength: 40, linkTextLength: 10 }))).toBe(0.25);
  });

  it("is 1 for a block without text", () => {
    expect(linkDensity(block({ textLength: 0 }))).toBe(1);
  });
});

describe("scoreBlock", () => {
  it("combines tag, link density, class/id and length", () => {
    expect(scoreBlock(article())).toBeCloseTo(0.84, 10);
    expect(scoreBlock(navigation())).toBeCloseTo(0.24, 10);
  });

  it("stays within [0, 1]", () => {
    const best = block({ tagName: "article", textLength: 10_000, classIdContext: "main" });
    const worst = block({ tagName: "marquee", textLength: 0, classIdContext: "ads" });
    expect(scoreBlock(best)).toBeCloseTo(1, 10);
    expect(scoreBlock(worst)).toBeGreaterThanOrEqual(0);
    expect(scoreBlock(worst)).toBeLessThanOrEqual(1);
  });
});

describe("PruningContentFilter", () => {
  it("keeps blocks at or above a fixed threshold", () => {
    const blocks = [navigation(), article(), navigation()];
    const outcome = new PruningContentFilter({
      type: "pruning",
      threshold: 0.48,
      thresholdType: "fixed",
      minWordThreshold: 0,
    }).filter(blocks);

    expect(outcome.blocks.map((scored) => scored.retained)).toEqual([false, true, false]);
    expect(outcome.retained.map((scored) => scored.index)).toEqual([blocks[1].index]);
  });

  it("drops blocks under the word floor whatever their score", () => {
    const short = block({ tagName: "p", textLength: 120, wordCount: 3 });
    const outcome = new PruningContentFilter({
      type: "pruning",
      threshold: 0,
      thresholdType: "fixed",
      minWordThreshold: 5,
    }).filter([short, article()]);

    expect(outcome.blocks.map((scored) => scored.retained)).toEqual([false, true]);
  });

  it("scales a dynamic threshold by the best score on the page", () => {
    const filter = new PruningContentFilter({
      type: "pruning",
      threshold: 0.5,
      thresholdType: "dynamic",
      minWordThreshold: 0,
    });

    // cutoff 0.42
    expect(filter.filter([navigation(), article()]).retained.map((scored) => scored.tagName)).toEqual(["p"]);
    // cutoff 0.12
    expect(filter.filter([navigation(), navigation()]).retained).toHaveLength(2);
  });

  it("returns nothing for an empty page", () => {
    const outcome = new PruningContentFilter({
      type: "pruning",
      threshold: 0.5,
      thresholdType: "dynamic",
      minWordThreshold: 0,
    }).filter([]);
    expect(outcome).toEqual({ blocks: [], retained: [] });
  });
});
