/**
 * Semantic Re-ranker Gateway
 * Sends borderline links to a classification provider in rate-limited batches.
 * Failures leave the affected links on their rule score and never propagate.
 */

import { CircuitBreaker, CircuitBreakerStats } from '../circuit-breaker';
import { TokenBucket, TokenBucketStats } from '../rate-limit';
import { ClassificationUnavailableError, errorMessage } from '../crawling/crawl-errors';
import {
  BatchBudget,
  ClassificationItem,
  ClassificationProvider,
  ClassificationScore,
  ReRankCandidate,
  ReRanker,
  ReRankOptions,
  ReRankResult,
  SemanticGatewayConfig,
} from './classification.types';

type ClassifyArgs = [readonly ClassificationItem[], readonly string[], AbortSignal | undefined];

export class SemanticGateway implements ReRanker {
  readonly name: string;
  readonly enabled = true;

  constructor(
    private readonly provider: ClassificationProvider,
    private readonly config: SemanticGatewayConfig,
    private readonly bucket: TokenBucket,
    private readonly breaker: CircuitBreaker<ClassifyArgs, Map<string, ClassificationScore>>
  ) {
    this.name = `gateway:${provider.name}`;
  }

  getBreakerStats(): CircuitBreakerStats {
    return this.breaker.getStats();
  }

  getBucketStats(): TokenBucketStats {
    return this.bucket.getStats();
  }

  createBudget(): BatchBudget {
    return new BatchBudget(this.config.maxBatchesPerJob);
  }

  /**
   * Whether a rule score falls inside the band worth a second opinion
   */
  isBorderline(ruleScore: number): boolean {
    return ruleScore >= this.config.bandLow && ruleScore <= this.config.bandHigh;
  }

  async refine(candidates: readonly ReRankCandidate[], options: ReRankOptions): Promise<ReRankResult> {
    const { keywords, budget, signal } = options;
    const scores = new Map<string, ClassificationScore>();
    const pending = this.selectBorderline(candidates);
    let batches = 0;
    let failedBatches = 0;

    for (let start = 0; start < pending.length; start += this.config.batchSize) {
      if (signal?.aborted) {
        break;
      }

      if (!budget.tryConsume()) {
        console.warn(`Gateway: batch budget of ${budget.limit} exhausted, ${pending.length - start} link(s) keep rule scores`);
        break;
      }

      const acquired = await this.bucket.acquire(signal);
      if (!acquired) {
        break;
      }

      const batch = pending.slice(start, start + this.config.batchSize);
      try {
        const answer = await this.breaker.execute(batch, keywords, signal);
        batches++;
        for (const item of batch) {
          const result = answer.get(item.url);
          if (result && result.score >= 0 && result.score <= 1) {
            scores.set(item.url, result);
          }
        }
      } catch (error) {
        failedBatches++;
        const unavailable = error instanceof ClassificationUnavailableError
          ? error
          : new ClassificationUnavailableError(errorMessage(error), error);
        console.warn(
          `Gateway: ClassificationUnavailable for batch of ${batch.length} via ${this.provider.name}: ${unavailable.message}`
        );
      }
    }

    return {
      scores,
      requested: pending.length,
      fallbacks: pending.length - scores.size,
      batches,
      failedBatches,
    };
  }

  private selectBorderline(candidates: readonly ReRankCandidate[]): ClassificationItem[] {
    const seen = new Set<string>();
    const selected: ClassificationItem[] = [];

    for (const candidate of candidates) {
      if (!this.isBorderline(candidate.ruleScore) || seen.has(candidate.url)) {
        continue;
      }
      seen.add(candidate.url);
      selected.push({
        url: candidate.url,
        anchorText: candidate.anchorText,
        surroundingText: candidate.surroundingText,
      });
    }

    return selected;
  }
}

/**
 * Breaker around a provider's classify call; its timeout is the per-batch timeout.
 * The provider gets a signal that aborts on that timeout or on job cancellation.
 */
export function createClassificationBreaker(
  provider: ClassificationProvider,
  config: { timeout: number; errorThresholdPercentage: number; resetTimeout: number; minimumRequests: number }
): CircuitBreaker<ClassifyArgs, Map<string, ClassificationScore>> {
  const classifyWithTimeout = async (
    items: readonly ClassificationItem[],
    keywords: readonly string[],
    signal: AbortSignal | undefined
  ): Promise<Map<string, ClassificationScore>> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeout);
    const onCancel = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener('abort', onCancel, { once: true });

    try {
      return await provider.classify(items, keywords, controller.signal);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCancel);
    }
  };

  return new CircuitBreaker<ClassifyArgs, Map<string, ClassificationScore>>(classifyWithTimeout, {
    name: `Classifier:${provider.name}`,
    ...config,
  });
}
