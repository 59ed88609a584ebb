/**
 * Classification Types
 * Contracts for the semantic re-ranking layer
 */

export interface ClassificationItem {
  url: string;
  anchorText: string;
  surroundingText: string;
}

export interface ClassificationScore {
  score: number;           // 0-1
  reason?: string;
}

/**
 * Backend that scores a batch of links against the topic keywords
 */
export interface ClassificationProvider {
  readonly name: string;
  isAvailable(): boolean;
  classify(
    items: readonly ClassificationItem[],
    keywords: readonly string[],
    signal?: AbortSignal
  ): Promise<Map<string, ClassificationScore>>;
}

export interface ReRankCandidate extends ClassificationItem {
  ruleScore: number;
}

export interface ReRankOptions {
  keywords: readonly string[];
  budget: BatchBudget;
  signal?: AbortSignal;
}

export interface ReRankResult {
  scores: Map<string, ClassificationScore>;
  requested: number;       // Distinct borderline candidates
  fallbacks: number;       // Requested candidates left with their rule score
  batches: number;         // Batches answered
  failedBatches: number;
}

export interface ReRanker {
  readonly name: string;
  readonly enabled: boolean;
  createBudget(): BatchBudget;
  refine(candidates: readonly ReRankCandidate[], options: ReRankOptions): Promise<ReRankResult>;
}

export interface SemanticGatewayConfig {
  bandLow: number;
  bandHigh: number;
  batchSize: number;
  maxBatchesPerJob: number;
}

/**
 * Job-scoped count of batches the re-ranker may still send
 */
export class BatchBudget {
  private used: number = 0;

  constructor(public readonly limit: number) {}

  tryConsume(): boolean {
    if (this.used >= this.limit) {
      return false;
    }
    this.used++;
    return true;
  }

  get consumed(): number {
    return this.used;
  }

  get exhausted(): boolean {
    return this.used >= this.limit;
  }
}
