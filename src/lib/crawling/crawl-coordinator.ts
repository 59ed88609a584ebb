/**
 * Crawl Coordinator
 * Level-synchronous breadth-first crawl: fetch a whole depth level through a
 * bounded worker pool, re-rank its borderline links, then record and enqueue.
 */

import pLimit from 'p-limit';
import { FetchFailureType, FetchOptions, FetchResult } from '../fetching/fetcher.types';
import { isHtmlContentType } from '../fetching/fetch-errors';
import { RuleBasedScorer } from '../scoring/rule-based.scorer';
import { DEFAULT_MERGE_POLICY, MergePolicy, mergeScores } from '../scoring/merge-policy';
import { LinkScoreResult } from '../scoring/scoring.types';
import { ReRanker, ReRankResult, BatchBudget } from '../classification/classification.types';
import { CrawlFrontier } from './crawl-frontier';
import { AllowAllPolicy, CrawlPolicy } from './crawl-policy';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import {
  CrawlJobConfig,
  CrawlJobStatus,
  CrawlProgressEvent,
  CrawlTask,
  CrawlingStatistics,
  LinkClassification,
  RawLink,
  ScoredLink,
} from './crawling.types';
import { ExtractionDegradedError, errorMessage } from './crawl-errors';
import { LinkExtractor } from './link-extractor';
import { resultAggregator } from './result-aggregator';
import { isHttpUrl, tryNormalizeUrl } from './url-normalizer';
import { VisitedSet } from './visited-set';

export interface PageSource {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>;
}

export interface CrawlCoordinatorDeps {
  fetcher: PageSource;
  extractor: LinkExtractor;
  scorer: RuleBasedScorer;
  reRanker: ReRanker;
  policy?: CrawlPolicy;
  mergePolicy?: MergePolicy;
  concurrency: number;
  fetchTimeoutMs: number;
}

export interface CrawlRunOptions {
  jobId?: string;
  signal?: AbortSignal;
  onProgress?: (event: CrawlProgressEvent) => void;
}

export interface CrawlOutcome {
  status: CrawlJobStatus.DONE | CrawlJobStatus.FAILED;
  results: ScoredLink[];
  stats: CrawlingStatistics;
  cancelled: boolean;
  error?: string;
}

interface LinkCandidate {
  link: RawLink;
  sourceUrl: string;
  depth: number;
  score: LinkScoreResult;
}

/**
 * State owned by one run; nothing here is shared between jobs
 */
interface CrawlRun {
  jobId: string;
  config: CrawlJobConfig;
  visited: VisitedSet;
  tracker: CrawlingStatisticsTracker;
  budget: BatchBudget;
  collected: ScoredLink[];
  maxPages: number;
  signal?: AbortSignal;
  onProgress?: (event: CrawlProgressEvent) => void;
}

const NON_TRAVERSABLE = new Set([LinkClassification.DOCUMENT, LinkClassification.CONTACT]);

export class CrawlCoordinator {
  private readonly policy: CrawlPolicy;
  private readonly mergePolicy: MergePolicy;

  constructor(private readonly deps: CrawlCoordinatorDeps) {
    this.policy = deps.policy ?? new AllowAllPolicy();
    this.mergePolicy = deps.mergePolicy ?? DEFAULT_MERGE_POLICY;
  }

  async run(config: CrawlJobConfig, options: CrawlRunOptions = {}): Promise<CrawlOutcome> {
    const run: CrawlRun = {
      jobId: options.jobId ?? 'local',
      config,
      visited: new VisitedSet(),
      tracker: new CrawlingStatisticsTracker(),
      budget: this.deps.reRanker.createBudget(),
      collected: [],
      maxPages: config.maxPages ?? Number.POSITIVE_INFINITY,
      signal: options.signal,
      onProgress: options.onProgress,
    };

    let frontier = this.seedFrontier(run);
    if (frontier.isEmpty()) {
      return this.finish(run, 0, 'No valid seed URL');
    }

    const limit = pLimit(Math.max(1, this.deps.concurrency));
    let seedsSucceeded = 0;

    while (!frontier.isEmpty() && !run.signal?.aborted) {
      const depth = frontier.depth;
      const tasks = frontier.drain();
      this.emit(run, `Fetching ${tasks.length} page(s) at depth ${depth}`, depth, tasks.length);

      const pages = await Promise.all(tasks.map((task) => limit(() => this.processTask(run, task))));
      const candidates = pages.flatMap((page) => page ?? []);

      if (depth === 0) {
        seedsSucceeded = pages.filter((page) => page !== null).length;
      }

      const reRanked = await this.reRank(run, candidates);
      frontier = await this.recordAndEnqueue(run, depth + 1, candidates, reRanked);

      this.emit(
        run,
        `Depth ${depth} done: ${candidates.length} link(s) scored, ${frontier.size()} queued`,
        depth,
        frontier.size()
      );
    }

    if (run.signal?.aborted) {
      console.log(`Coordinator: [${run.jobId}] cancelled, ${run.collected.length} link(s) kept`);
    }

    return this.finish(run, seedsSucceeded, 'Every seed URL failed to fetch');
  }

  private seedFrontier(run: CrawlRun): CrawlFrontier {
    const frontier = new CrawlFrontier(0);

    for (const seed of run.config.seedUrls) {
      const url = tryNormalizeUrl(seed);
      if (!url || !isHttpUrl(url)) {
        run.tracker.recordInvalidUrls();
        console.warn(`Coordinator: [${run.jobId}] skipping invalid seed "${seed}"`);
        continue;
      }
      if (run.visited.size >= run.maxPages) {
        break;
      }
      if (run.visited.markVisited(url)) {
        frontier.add({ url, depth: 0 });
      }
    }

    return frontier;
  }

  /**
   * Fetch, extract and rule-score one page. Null when the page yielded nothing usable.
   */
  private async processTask(run: CrawlRun, task: CrawlTask): Promise<LinkCandidate[] | null> {
    const { tracker, signal } = run;

    if (signal?.aborted) {
      tracker.recordCancelled();
      return null;
    }

    try {
      const result = await this.deps.fetcher.fetch(task.url, {
        timeoutMs: this.deps.fetchTimeoutMs,
        signal,
      });

      if (!result.ok) {
        tracker.recordFetchFailure(result.error.type);
        if (result.error.type !== FetchFailureType.CANCELLED) {
          console.warn(`Coordinator: [${run.jobId}] fetch failed for ${task.url}: ${result.error.message}`);
        }
        return null;
      }

      tracker.recordPageFetched(task.depth, result.duration);

      const finalUrl = tryNormalizeUrl(result.finalUrl) ?? task.url;
      if (finalUrl !== task.url && !run.visited.markVisited(finalUrl)) {
        // Redirected onto a page this job already has
        return [];
      }

      if (!isHtmlContentType(result.contentType)) {
        return [];
      }

      const extraction = this.deps.extractor.extract(result.body, finalUrl, run.config.maxLinksPerPage);
      if (extraction.droppedAnchors > 0) {
        tracker.recordInvalidUrls(extraction.droppedAnchors);
      }
      if (extraction.degraded) {
        tracker.recordDegradedPage();
        const warning = new ExtractionDegradedError(task.url, extraction.droppedAnchors, extraction.degradedReason);
        console.warn(`Coordinator: [${run.jobId}] ${warning.message}`);
      }
      tracker.recordLinksDiscovered(extraction.links.length);

      return extraction.links.map((link) => ({
        link,
        sourceUrl: task.url,
        depth: task.depth + 1,
        score: this.deps.scorer.score({
          href: link.href,
          anchorText: link.anchorText,
          surroundingText: link.surroundingText,
          keywords: run.config.keywords,
        }),
      }));
    } catch (error) {
      console.error(`Coordinator: [${run.jobId}] unexpected error on ${task.url}:`, errorMessage(error));
      return null;
    }
  }

  private async reRank(run: CrawlRun, candidates: LinkCandidate[]): Promise<ReRankResult | null> {
    if (run.signal?.aborted || candidates.length === 0 || !this.deps.reRanker.enabled) {
      return null;
    }

    const result = await this.deps.reRanker.refine(
      candidates.map((candidate) => ({
        url: candidate.link.href,
        anchorText: candidate.link.anchorText,
        surroundingText: candidate.link.surroundingText,
        ruleScore: candidate.score.ruleScore,
      })),
      { keywords: run.config.keywords, budget: run.budget, signal: run.signal }
    );

    run.tracker.recordClassification(result.requested, result.fallbacks, result.batches);
    if (result.fallbacks > 0) {
      console.warn(`Coordinator: [${run.jobId}] ${result.fallbacks} link(s) kept rule scores (classification unavailable)`);
    }

    return result;
  }

  private async recordAndEnqueue(
    run: CrawlRun,
    nextDepth: number,
    candidates: LinkCandidate[],
    reRanked: ReRankResult | null
  ): Promise<CrawlFrontier> {
    const next = new CrawlFrontier(nextDepth);

    for (const candidate of candidates) {
      const semantic = reRanked?.scores.get(candidate.link.href);
      const scored: ScoredLink = {
        url: candidate.link.href,
        sourceUrl: candidate.sourceUrl,
        depth: candidate.depth,
        anchorText: candidate.link.anchorText,
        surroundingText: candidate.link.surroundingText,
        ruleScore: candidate.score.ruleScore,
        llmScore: semantic?.score,
        llmReason: semantic?.reason,
        finalScore: mergeScores(candidate.score.ruleScore, semantic?.score, this.mergePolicy),
        matchedKeywords: candidate.score.matchedKeywords,
        classification: candidate.score.classification,
      };

      if (scored.finalScore >= run.config.minScore) {
        run.collected.push(scored);
        run.tracker.recordLinkRecorded();
      }

      if (await this.shouldEnqueue(run, scored)) {
        next.add({ url: scored.url, depth: nextDepth, parentUrl: scored.sourceUrl });
      }
    }

    return next;
  }

  private async shouldEnqueue(run: CrawlRun, link: ScoredLink): Promise<boolean> {
    if (run.signal?.aborted || link.depth > run.config.maxDepth) {
      return false;
    }
    if (!isHttpUrl(link.url) || NON_TRAVERSABLE.has(link.classification)) {
      return false;
    }
    if (run.visited.size >= run.maxPages || run.visited.isVisited(link.url)) {
      return false;
    }

    try {
      if (!(await this.policy.isAllowed(link.url))) {
        return false;
      }
    } catch (error) {
      console.warn(`Coordinator: [${run.jobId}] policy ${this.policy.name} rejected ${link.url}:`, errorMessage(error));
      return false;
    }

    return run.visited.markVisited(link.url);
  }

  private finish(run: CrawlRun, seedsSucceeded: number, failureReason: string): CrawlOutcome {
    const cancelled = run.signal?.aborted ?? false;
    const results = resultAggregator.finalize(run.collected);
    const stats = run.tracker.getStatistics();

    if (seedsSucceeded === 0) {
      const error = cancelled ? 'Cancelled before any seed was fetched' : failureReason;
      return { status: CrawlJobStatus.FAILED, results, stats, cancelled, error };
    }

    return { status: CrawlJobStatus.DONE, results, stats, cancelled };
  }

  private emit(run: CrawlRun, message: string, depth: number, frontierSize: number): void {
    run.onProgress?.({
      jobId: run.jobId,
      status: CrawlJobStatus.RUNNING,
      message,
      depth,
      frontierSize,
      linksRecorded: run.collected.length,
      stats: run.tracker.getStatistics(),
    });
  }
}
