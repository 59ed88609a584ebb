/**
 * Result Aggregator
 * Merges, deduplicates and orders scored links before they go to storage
 */

import { ScoredLink } from './crawling.types';

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Whether candidate should replace current for the same URL
 */
function isPreferred(candidate: ScoredLink, current: ScoredLink): boolean {
  if (candidate.finalScore !== current.finalScore) {
    return candidate.finalScore > current.finalScore;
  }
  if (candidate.depth !== current.depth) {
    return candidate.depth < current.depth;
  }
  if (candidate.sourceUrl !== current.sourceUrl) {
    return compareStrings(candidate.sourceUrl, current.sourceUrl) < 0;
  }
  return compareStrings(candidate.anchorText, current.anchorText) < 0;
}

/**
 * Ranking order: finalScore desc, then depth asc, then URL asc
 */
export function compareScoredLinks(a: ScoredLink, b: ScoredLink): number {
  if (a.finalScore !== b.finalScore) {
    return b.finalScore - a.finalScore;
  }
  if (a.depth !== b.depth) {
    return a.depth - b.depth;
  }
  return compareStrings(a.url, b.url);
}

export class ResultAggregator {
  /**
   * One entry per canonical URL (highest finalScore wins), in ranking order.
   * The output depends only on the input set, not its order.
   */
  finalize(links: readonly ScoredLink[]): ScoredLink[] {
    const best = new Map<string, ScoredLink>();

    for (const link of links) {
      const current = best.get(link.url);
      if (!current || isPreferred(link, current)) {
        best.set(link.url, link);
      }
    }

    return Array.from(best.values()).sort(compareScoredLinks);
  }
}

export const resultAggregator = new ResultAggregator();
