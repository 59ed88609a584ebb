/**
 * Classification System
 * Re-ranker selection and shared gateway state
 */

import { env } from '../../config/env';
import { CircuitBreakerStats } from '../circuit-breaker';
import { TokenBucket, TokenBucketStats } from '../rate-limit';
import { ClassificationProvider, ReRanker } from './classification.types';
import { GeminiClassifier } from './gemini.classifier';
import { OpenAIClassifier } from './openai.classifier';
import { passthroughReRanker } from './passthrough.reranker';
import { createClassificationBreaker, SemanticGateway } from './semantic-gateway';

export * from './classification.types';
export * from './llm-base.classifier';
export * from './openai.classifier';
export * from './gemini.classifier';
export * from './semantic-gateway';
export * from './passthrough.reranker';

let sharedGateway: SemanticGateway | null = null;

export function createClassificationProvider(name: string = env.CLASSIFIER_PROVIDER): ClassificationProvider {
  switch (name.toLowerCase()) {
    case 'gemini':
      return new GeminiClassifier();
    case 'openai':
      return new OpenAIClassifier();
    default:
      throw new Error(`Unknown classifier provider: ${name}`);
  }
}

/**
 * Gateway shared by every job so the token bucket and breaker bound the
 * process as a whole
 */
function getSharedGateway(provider: ClassificationProvider): SemanticGateway {
  if (!sharedGateway) {
    const bucket = new TokenBucket({
      capacity: env.RERANK_BURST,
      refillPerSecond: env.RERANK_RATE_PER_MINUTE / 60,
    });
    const breaker = createClassificationBreaker(provider, {
      timeout: env.RERANK_TIMEOUT,
      errorThresholdPercentage: env.CIRCUIT_BREAKER_ERROR_THRESHOLD,
      resetTimeout: env.CIRCUIT_BREAKER_RESET_TIMEOUT,
      minimumRequests: env.CIRCUIT_BREAKER_MIN_REQUESTS,
    });
    sharedGateway = new SemanticGateway(
      provider,
      {
        bandLow: env.RERANK_BAND_LOW,
        bandHigh: env.RERANK_BAND_HIGH,
        batchSize: env.RERANK_BATCH_SIZE,
        maxBatchesPerJob: env.RERANK_MAX_BATCHES_PER_JOB,
      },
      bucket,
      breaker
    );
  }
  return sharedGateway;
}

/**
 * Breaker and token bucket counters of the shared gateway; null until a job has used it
 */
export function getClassifierHealth(): {
  provider: string;
  breaker: CircuitBreakerStats;
  tokenBucket: TokenBucketStats;
} | null {
  if (!sharedGateway) {
    return null;
  }
  return {
    provider: sharedGateway.name,
    breaker: sharedGateway.getBreakerStats(),
    tokenBucket: sharedGateway.getBucketStats(),
  };
}

export function createReRanker(useLlm: boolean): ReRanker {
  if (!useLlm) {
    return passthroughReRanker;
  }

  const provider = createClassificationProvider();
  if (!provider.isAvailable()) {
    console.warn(`Gateway: ${provider.name} API key not configured, links keep rule scores`);
    return passthroughReRanker;
  }

  return getSharedGateway(provider);
}
