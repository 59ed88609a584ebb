/**
 * Crawling Statistics Tracker
 * Per-job counters surfaced with the job status
 */

import { CrawlingStatistics } from './crawling.types';
import { FetchFailureType } from '../fetching/fetcher.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesFetched: number = 0;
  private pagesCancelled: number = 0;
  private fetchFailures = { timeout: 0, http: 0, network: 0 };
  private linksDiscovered: number = 0;
  private linksRecorded: number = 0;
  private invalidUrls: number = 0;
  private degradedPages: number = 0;
  private classificationRequested: number = 0;
  private classificationFallbacks: number = 0;
  private classificationBatches: number = 0;
  private maxDepthReached: number = 0;
  private pageTimes: number[] = [];

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Record a successful page fetch
   */
  recordPageFetched(depth: number, time: number): void {
    this.pagesFetched++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.pageTimes.push(time);
  }

  /**
   * Record a failed fetch; cancellations are tracked apart from failures
   */
  recordFetchFailure(type: FetchFailureType): void {
    switch (type) {
      case FetchFailureType.TIMEOUT:
        this.fetchFailures.timeout++;
        break;
      case FetchFailureType.HTTP_ERROR:
        this.fetchFailures.http++;
        break;
      case FetchFailureType.NETWORK_ERROR:
        this.fetchFailures.network++;
        break;
      case FetchFailureType.CANCELLED:
        this.pagesCancelled++;
        break;
    }
  }

  recordCancelled(): void {
    this.pagesCancelled++;
  }

  recordLinksDiscovered(count: number): void {
    this.linksDiscovered += count;
  }

  recordLinkRecorded(): void {
    this.linksRecorded++;
  }

  recordInvalidUrls(count: number = 1): void {
    this.invalidUrls += count;
  }

  recordDegradedPage(): void {
    this.degradedPages++;
  }

  /**
   * Record the outcome of one re-ranking pass
   */
  recordClassification(requested: number, fallbacks: number, batches: number): void {
    this.classificationRequested += requested;
    this.classificationFallbacks += fallbacks;
    this.classificationBatches += batches;
  }

  /**
   * Get final statistics
   */
  getStatistics(): CrawlingStatistics {
    const totalTime = Date.now() - this.startTime;
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;

    const pagesFailed = this.fetchFailures.timeout + this.fetchFailures.http + this.fetchFailures.network;
    const totalAttempts = this.pagesFetched + pagesFailed;
    const successRate = totalAttempts > 0 ? this.pagesFetched / totalAttempts : 0;

    return {
      pagesFetched: this.pagesFetched,
      pagesFailed,
      pagesCancelled: this.pagesCancelled,
      fetchFailures: { ...this.fetchFailures },
      linksDiscovered: this.linksDiscovered,
      linksRecorded: this.linksRecorded,
      invalidUrls: this.invalidUrls,
      degradedPages: this.degradedPages,
      classificationRequested: this.classificationRequested,
      classificationFallbacks: this.classificationFallbacks,
      classificationBatches: this.classificationBatches,
      depthReached: this.maxDepthReached,
      totalTime,
      averagePageTime,
      successRate,
    };
  }
}
