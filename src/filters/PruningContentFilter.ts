import {
  DEFAULT_LENGTH_BASELINE,
  DEFAULT_TAG_WEIGHT,
  MAX_TAG_WEIGHT,
  NEGATIVE_CLASS_ID_KEYWORDS,
  POSITIVE_CLASS_ID_KEYWORDS,
  PRUNING_LENGTH_BASELINES,
  PRUNING_METRIC_WEIGHTS,
  PRUNING_TAG_WEIGHTS,
} from "../constants.js";
import type { ContentBlock, FilterOutcome, ResolvedPruningFilterOptions, ScoredBlock } from "../types.js";

/**
 * Query-free boilerplate filter.
 *
 * Each block gets a composite score in [0, 1] from its tag, its link density, the
 * keywords in its class/id context and its text length against a per-tag baseline.
 * `fixed` drops blocks below the threshold; `dynamic` drops blocks below
 * `threshold x best score on the page`. Blocks under `minWordThreshold` words are
 * always dropped.
 */
export class PruningContentFilter {
  constructor(private readonly options: ResolvedPruningFilterOptions) {}

  public filter(blocks: ReadonlyArray<ContentBlock>): FilterOutcome {
    const scores = blocks.map((block) => scoreBlock(block));
    const cutoff = this.cutoffFor(scores);

    const scored: ScoredBlock[] = blocks.map((block, i) => ({
      ...block,
      score: scores[i],
      retained: block.wordCount >= this.options.minWordThreshold && scores[i] >= cutoff,
    }));

    return { blocks: scored, retained: scored.filter((block) => block.retained) };
  }

  private cutoffFor(scores: number[]): number {
    if (this.options.thresholdType === "fixed") {
      return this.options.threshold;
    }
    const best = scores.length > 0 ? Math.max(...scores) : 0;
    return this.options.threshold * best;
  }
}

export function scoreBlock(block: ContentBlock): number {
  const weights = PRUNING_METRIC_WEIGHTS;
  const tagScore = (PRUNING_TAG_WEIGHTS[block.tagName] ?? DEFAULT_TAG_WEIGHT) / MAX_TAG_WEIGHT;
  const linkScore = 1 - linkDensity(block);
  const classIdScore = classIdWeight(block.classIdContext);
  const baseline = PRUNING_LENGTH_BASELINES[block.tagName] ?? DEFAULT_LENGTH_BASELINE;
  const lengthScore = Math.min(1, block.textLength / baseline);

  return (
    weights.tagWeight * tagScore +
    weights.linkDensity * linkScore +
    weights.classIdWeight * classIdScore +
    weights.textLength * lengthScore
  );
}

/**
 * Share of the block's text that sits inside anchors; 1 for a block without text.
 */
export function linkDensity(block: ContentBlock): number {
  return block.textLength > 0 ? block.linkTextLength / block.textLength : 1;
}

/**
 * 0 when the class/id context names boilerplate, 1 when it names content, 0.5 otherwise.
 */
export function classIdWeight(context: string): number {
  const normalized = context.toLowerCase();
  if (!normalized) return 0.5;
  if (NEGATIVE_CLASS_ID_KEYWORDS.some((keyword) => normalized.includes(keyword))) return 0;
  return POSITIVE_CLASS_ID_KEYWORDS.some((keyword) => normalized.includes(keyword)) ? 1 : 0.5;
}
