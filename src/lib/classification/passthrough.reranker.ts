/**
 * Passthrough Re-ranker
 * Used when semantic re-ranking is off: every link keeps its rule score
 */

import { BatchBudget, ReRanker, ReRankResult } from './classification.types';

export class PassthroughReRanker implements ReRanker {
  readonly name = 'passthrough';
  readonly enabled = false;

  createBudget(): BatchBudget {
    return new BatchBudget(0);
  }

  async refine(): Promise<ReRankResult> {
    return {
      scores: new Map(),
      requested: 0,
      fallbacks: 0,
      batches: 0,
      failedBatches: 0,
    };
  }
}

export const passthroughReRanker = new PassthroughReRanker();
