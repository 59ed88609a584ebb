/**
 * Crawler Service
 * Job surface: submit, status, results and cancellation. Jobs run in process
 * and hand their ranked results to the link store when they finish.
 */

import { randomUUID } from 'crypto';
import { env } from '../../config/env';
import { getIO, isSocketInitialized } from '../../lib/socket';
import {
  CrawlJob,
  CrawlJobConfig,
  CrawlJobStatus,
  CrawlProgressEvent,
  errorMessage,
  ScoredLink,
} from '../../lib/crawling';
import { ApiError } from '../../middleware/error-handler';
import { getLinkStore } from '../links/links.store';
import { LinkStore } from '../links/links.types';
import { clampLimit, clampOffset } from '../links/links.query';
import { CoordinatorFactory, createCrawlCoordinator } from './crawler.factory';

export interface CrawlerServiceDeps {
  createCoordinator: CoordinatorFactory;
  getStore: () => LinkStore;
  emitProgress: (event: CrawlProgressEvent) => void;
  generateId: () => string;
  /**
   * Finished jobs kept for status and results; the oldest are dropped first
   */
  maxRetainedJobs: number;
}

/**
 * Broadcast progress to the job's socket room when a server is running
 */
export const emitToJobRoom = (event: CrawlProgressEvent): void => {
  if (isSocketInitialized()) {
    getIO().to(`job:${event.jobId}`).emit('crawl:progress', event);
  }
};

const TERMINAL_STATUSES = new Set([CrawlJobStatus.DONE, CrawlJobStatus.FAILED]);

export class CrawlerService {
  private jobs: Map<string, CrawlJob> = new Map();
  private results: Map<string, ScoredLink[]> = new Map();
  private controllers: Map<string, AbortController> = new Map();
  private running: Map<string, Promise<void>> = new Map();
  private readonly deps: CrawlerServiceDeps;

  constructor(deps: Partial<CrawlerServiceDeps> = {}) {
    this.deps = {
      createCoordinator: deps.createCoordinator ?? createCrawlCoordinator,
      getStore: deps.getStore ?? getLinkStore,
      emitProgress: deps.emitProgress ?? emitToJobRoom,
      generateId: deps.generateId ?? randomUUID,
      maxRetainedJobs: deps.maxRetainedJobs ?? env.CRAWL_MAX_RETAINED_JOBS,
    };
  }

  /**
   * Register a job and start it in the background. Returns immediately.
   */
  submit(config: CrawlJobConfig): CrawlJob {
    const job: CrawlJob = {
      ...config,
      seedUrls: [...config.seedUrls],
      keywords: [...config.keywords],
      id: this.deps.generateId(),
      status: CrawlJobStatus.PENDING,
      cancelled: false,
      resultCount: 0,
      storedCount: 0,
      createdAt: new Date(),
    };

    this.jobs.set(job.id, job);
    this.controllers.set(job.id, new AbortController());
    console.log(`Crawler: Job ${job.id} submitted with ${job.seedUrls.length} seed(s), maxDepth ${job.maxDepth}`);

    this.running.set(job.id, this.execute(job));
    return this.snapshot(job);
  }

  /**
   * Current state of a job, or null when unknown
   */
  status(jobId: string): CrawlJob | null {
    const job = this.jobs.get(jobId);
    return job ? this.snapshot(job) : null;
  }

  /**
   * Ranked results of a job; empty until the job finishes
   */
  getResults(jobId: string, options: { limit?: number; offset?: number } = {}): { results: ScoredLink[]; total: number } {
    if (!this.jobs.has(jobId)) {
      throw new ApiError(404, 'Crawl job not found');
    }

    const all = this.results.get(jobId) ?? [];
    const offset = clampOffset(options.offset);
    return {
      results: all.slice(offset, offset + clampLimit(options.limit)),
      total: all.length,
    };
  }

  getAllResults(jobId: string): ScoredLink[] {
    return [...(this.results.get(jobId) ?? [])];
  }

  /**
   * Request cancellation. Finished jobs are returned unchanged.
   */
  cancel(jobId: string): CrawlJob {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new ApiError(404, 'Crawl job not found');
    }

    if (!TERMINAL_STATUSES.has(job.status)) {
      job.cancelled = true;
      this.controllers.get(jobId)?.abort();
      console.log(`Crawler: Job ${jobId} cancellation requested`);
    }

    return this.snapshot(job);
  }

  listJobs(): CrawlJob[] {
    return Array.from(this.jobs.values())
      .map((job) => this.snapshot(job))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Resolve once the job has reached a terminal status
   */
  async waitForJob(jobId: string): Promise<CrawlJob | null> {
    await this.running.get(jobId);
    return this.status(jobId);
  }

  private async execute(job: CrawlJob): Promise<void> {
    const controller = this.controllers.get(job.id) ?? new AbortController();

    // Let submit() return before any work starts
    await Promise.resolve();

    job.status = CrawlJobStatus.RUNNING;
    job.startedAt = new Date();
    this.emit(job, 'Crawl started');

    try {
      const coordinator = this.deps.createCoordinator(job.useLlm);
      const outcome = await coordinator.run(
        {
          seedUrls: job.seedUrls,
          keywords: job.keywords,
          maxDepth: job.maxDepth,
          minScore: job.minScore,
          maxLinksPerPage: job.maxLinksPerPage,
          useLlm: job.useLlm,
          maxPages: job.maxPages,
        },
        {
          jobId: job.id,
          signal: controller.signal,
          onProgress: (event) => this.recordProgress(job, event),
        }
      );

      this.results.set(job.id, outcome.results);
      job.resultCount = outcome.results.length;
      job.stats = outcome.stats;
      job.cancelled = outcome.cancelled;
      job.error = outcome.error;

      if (outcome.results.length > 0) {
        await this.store(job, outcome.results);
      }

      job.status = outcome.status;
    } catch (error) {
      console.error(`Crawler: Job ${job.id} failed:`, errorMessage(error));
      job.status = CrawlJobStatus.FAILED;
      job.error = errorMessage(error);
    } finally {
      job.completedAt = new Date();
      this.controllers.delete(job.id);
      this.running.delete(job.id);
    }

    const summary = job.status === CrawlJobStatus.DONE
      ? `Crawl finished with ${job.resultCount} link(s)${job.cancelled ? ' (cancelled)' : ''}`
      : `Crawl failed: ${job.error ?? 'unknown error'}`;
    console.log(`Crawler: Job ${job.id} ${summary}`);
    this.emit(job, summary);
    this.evictFinishedJobs();
  }

  private evictFinishedJobs(): void {
    const finished = Array.from(this.jobs.values())
      .filter((job) => TERMINAL_STATUSES.has(job.status))
      .sort((a, b) => (a.completedAt?.getTime() ?? 0) - (b.completedAt?.getTime() ?? 0));

    const excess = finished.length - Math.max(0, this.deps.maxRetainedJobs);
    for (const job of finished.slice(0, Math.max(0, excess))) {
      this.jobs.delete(job.id);
      this.results.delete(job.id);
    }
  }

  /**
   * Hand results to the link store. A storage failure is reported on the job
   * but does not change its crawl status.
   */
  private async store(job: CrawlJob, results: ScoredLink[]): Promise<void> {
    const store = this.deps.getStore();
    try {
      job.storedCount = await store.upsertMany(results, job.id);
    } catch (error) {
      console.error(`Crawler: Job ${job.id} could not store results in ${store.name}:`, errorMessage(error));
      job.error = `Storage failed: ${errorMessage(error)}`;
    }
  }

  /**
   * Keep partial counts on the job while it runs, then forward the event
   */
  private recordProgress(job: CrawlJob, event: CrawlProgressEvent): void {
    if (event.stats) {
      job.stats = event.stats;
    }
    if (event.linksRecorded !== undefined) {
      job.resultCount = event.linksRecorded;
    }
    this.deps.emitProgress(event);
  }

  private emit(job: CrawlJob, message: string): void {
    this.deps.emitProgress({
      jobId: job.id,
      status: job.status,
      message,
      linksRecorded: job.resultCount,
    });
  }

  private snapshot(job: CrawlJob): CrawlJob {
    return {
      ...job,
      seedUrls: [...job.seedUrls],
      keywords: [...job.keywords],
      stats: job.stats ? { ...job.stats, fetchFailures: { ...job.stats.fetchFailures } } : undefined,
    };
  }
}

export const crawlerService = new CrawlerService();
