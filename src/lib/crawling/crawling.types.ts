/**
 * Crawling Types
 * Type definitions for the depth-bounded link crawl
 */

/**
 * Classification assigned to a discovered link
 */
export enum LinkClassification {
  DOCUMENT = 'DOCUMENT',
  CONTACT = 'CONTACT',
  GENERIC = 'GENERIC',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Crawl job lifecycle
 */
export enum CrawlJobStatus {
  PENDING = 'PENDING',
  RUNNING = 'RUNNING',
  DONE = 'DONE',
  FAILED = 'FAILED',
}

/**
 * A unit of fetch work. Created once per URL, never mutated.
 */
export interface CrawlTask {
  readonly url: string;
  /**
   * Crawl depth (0 = seed)
   */
  readonly depth: number;
  readonly parentUrl?: string;
}

/**
 * A candidate link pulled out of a page
 */
export interface RawLink {
  /**
   * Canonical absolute URL
   */
  href: string;
  /**
   * href attribute as written in the markup
   */
  rawHref: string;
  anchorText: string;
  surroundingText: string;
}

/**
 * Result of fetching and extracting one page
 */
export interface PageContext {
  url: string;
  fetchedAt: Date;
  statusCode: number;
  rawLinks: RawLink[];
}

/**
 * A link with its relevance scores. Immutable once finalScore is set.
 */
export interface ScoredLink {
  readonly url: string;
  readonly sourceUrl: string;
  /**
   * Depth the link sits at (discovering page depth + 1)
   */
  readonly depth: number;
  readonly anchorText: string;
  readonly surroundingText: string;
  readonly ruleScore: number;
  readonly llmScore?: number;
  readonly llmReason?: string;
  readonly finalScore: number;
  readonly matchedKeywords: readonly string[];
  readonly classification: LinkClassification;
}

/**
 * Parameters of one crawl job
 */
export interface CrawlJobConfig {
  seedUrls: string[];
  keywords: string[];
  maxDepth: number;
  minScore: number;
  maxLinksPerPage: number;
  useLlm: boolean;
  /**
   * Upper bound on distinct URLs admitted to the visited set
   */
  maxPages?: number;
}

/**
 * Crawling statistics
 */
export interface CrawlingStatistics {
  pagesFetched: number;
  pagesFailed: number;
  pagesCancelled: number;
  fetchFailures: {
    timeout: number;
    http: number;
    network: number;
  };
  linksDiscovered: number;
  linksRecorded: number;
  invalidUrls: number;
  degradedPages: number;
  classificationRequested: number;
  classificationFallbacks: number;
  classificationBatches: number;
  depthReached: number;
  totalTime: number;
  averagePageTime: number;
  /**
   * Successful fetches over attempted fetches (0-1)
   */
  successRate: number;
}

/**
 * Aggregate crawl job record
 */
export interface CrawlJob extends CrawlJobConfig {
  id: string;
  status: CrawlJobStatus;
  cancelled: boolean;
  resultCount: number;
  storedCount: number;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  error?: string;
  stats?: CrawlingStatistics;
}

/**
 * Progress notification emitted while a job runs
 */
export interface CrawlProgressEvent {
  jobId: string;
  status: CrawlJobStatus;
  message: string;
  depth?: number;
  frontierSize?: number;
  linksRecorded?: number;
  /**
   * Counters so far; set on events emitted while the crawl runs
   */
  stats?: CrawlingStatistics;
}
