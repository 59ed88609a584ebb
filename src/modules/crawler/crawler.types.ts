/**
 * Crawler Module Types
 */

import { CrawlJob, ScoredLink } from '../../lib/crawling';

/**
 * Body of POST /api/crawl. seedUrl is accepted as a single-seed shorthand.
 */
export interface ICreateCrawlJobRequest {
  seedUrls?: unknown;
  seedUrl?: unknown;
  keywords?: unknown;
  maxDepth?: unknown;
  minScore?: unknown;
  maxLinksPerPage?: unknown;
  useLlm?: unknown;
  maxPages?: unknown;
}

export interface ICrawlJobResponse {
  success: boolean;
  jobId: string;
  job: CrawlJob;
}

export interface ICrawlResultsResponse {
  success: boolean;
  jobId: string;
  results: ScoredLink[];
  total: number;
  limit: number;
  offset: number;
}
