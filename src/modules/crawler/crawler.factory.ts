/**
 * Crawl Coordinator Factory
 * Wires the coordinator from configuration. The fetcher is shared so the
 * per-host cap holds across concurrent jobs.
 */

import { env } from '../../config/env';
import { createReRanker } from '../../lib/classification';
import { CrawlCoordinator, linkExtractor } from '../../lib/crawling';
import { PageFetcher } from '../../lib/fetching';
import { parseMergePolicy, ruleBasedScorer } from '../../lib/scoring';

const sharedFetcher = new PageFetcher({
  timeoutMs: env.CRAWL_FETCH_TIMEOUT,
  perDomainConcurrency: env.CRAWL_PER_DOMAIN_CONCURRENCY,
  userAgent: env.CRAWL_USER_AGENT,
});

export type CoordinatorFactory = (useLlm: boolean) => CrawlCoordinator;

export const createCrawlCoordinator: CoordinatorFactory = (useLlm) => {
  return new CrawlCoordinator({
    fetcher: sharedFetcher,
    extractor: linkExtractor,
    scorer: ruleBasedScorer,
    reRanker: createReRanker(useLlm),
    mergePolicy: parseMergePolicy(env.SCORE_MERGE_POLICY, env.SCORE_BLEND_WEIGHT),
    concurrency: env.CRAWL_CONCURRENCY,
    fetchTimeoutMs: env.CRAWL_FETCH_TIMEOUT,
  });
};
