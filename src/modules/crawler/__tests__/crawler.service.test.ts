/**
 * Crawler Service Tests
 */

import { CrawlerService } from '../crawler.service';
import { CrawlCoordinator } from '../../../lib/crawling/crawl-coordinator';
import { CrawlJob, CrawlJobConfig, CrawlJobStatus, CrawlProgressEvent } from '../../../lib/crawling/crawling.types';
import { LinkExtractor } from '../../../lib/crawling/link-extractor';
import { PageFetcher } from '../../../lib/fetching/page-fetcher';
import { RuleBasedScorer } from '../../../lib/scoring/rule-based.scorer';
import { PassthroughReRanker } from '../../../lib/classification/passthrough.reranker';
import { MemoryLinkRepository } from '../../links/links.memory-repository';
import { createFakeTransport, FakePage } from '../../../__tests__/helpers/mocks';
import { HOME_PAGE, TEST_KEYWORDS } from '../../../__tests__/helpers/fixtures';

const HOME = 'https://example.gov/';

class FailingLinkRepository extends MemoryLinkRepository {
  async upsertMany(): Promise<number> {
    throw new Error('disk full');
  }
}

const CONFIG: CrawlJobConfig = {
  seedUrls: [HOME],
  keywords: TEST_KEYWORDS,
  maxDepth: 1,
  minScore: 0.1,
  maxLinksPerPage: 100,
  useLlm: false,
};

describe('CrawlerService', () => {
  let store: MemoryLinkRepository;
  let events: CrawlProgressEvent[];
  let requests: string[];
  let sequence: number;

  function createService(
    pages: Record<string, FakePage>,
    overrides: { store?: MemoryLinkRepository; maxRetainedJobs?: number } = {}
  ) {
    const fake = createFakeTransport(pages);
    requests = fake.requests;
    const activeStore = overrides.store ?? store;

    return new CrawlerService({
      createCoordinator: () =>
        new CrawlCoordinator({
          fetcher: new PageFetcher({
            timeoutMs: 1000,
            perDomainConcurrency: 2,
            userAgent: 'test-agent',
            transport: fake.transport,
          }),
          extractor: new LinkExtractor(),
          scorer: new RuleBasedScorer(),
          reRanker: new PassthroughReRanker(),
          concurrency: 2,
          fetchTimeoutMs: 1000,
        }),
      getStore: () => activeStore,
      emitProgress: (event) => events.push(event),
      generateId: () => `job-${++sequence}`,
      maxRetainedJobs: overrides.maxRetainedJobs,
    });
  }

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new MemoryLinkRepository();
    events = [];
    sequence = 0;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('submit', () => {
    it('should return a pending job immediately', async () => {
      const service = createService({ [HOME]: { body: HOME_PAGE } });

      const job = service.submit(CONFIG);

      expect(job.id).toBe('job-1');
      expect(job.status).toBe(CrawlJobStatus.PENDING);
      expect(job.resultCount).toBe(0);
      await service.waitForJob(job.id);
    });

    it('should run the crawl and store the ranked results', async () => {
      const service = createService({ [HOME]: { body: HOME_PAGE } });

      const { id } = service.submit(CONFIG);
      const job = await service.waitForJob(id);

      expect(job?.status).toBe(CrawlJobStatus.DONE);
      expect(job?.resultCount).toBe(4);
      expect(job?.storedCount).toBe(4);
      expect(job?.startedAt).toBeInstanceOf(Date);
      expect(job?.completedAt).toBeInstanceOf(Date);
      expect(job?.stats?.pagesFetched).toBe(1);
      expect(await store.count({ jobId: id })).toBe(4);
    });

    it('should report progress from start to finish', async () => {
      const service = createService({ [HOME]: { body: HOME_PAGE } });

      const { id } = service.submit(CONFIG);
      await service.waitForJob(id);

      expect(events[0]).toEqual({
        jobId: 'job-1',
        status: CrawlJobStatus.RUNNING,
        message: 'Crawl started',
        linksRecorded: 0,
      });
      expect(events[1].message).toBe('Fetching 1 page(s) at depth 0');
      expect(events[events.length - 1]).toEqual({
        jobId: 'job-1',
        status: CrawlJobStatus.DONE,
        message: 'Crawl finished with 4 link(s)',
        linksRecorded: 4,
      });
    });

    it('should report partial counts while the crawl runs', async () => {
      const snapshots = new Map<string, CrawlJob | null>();
      const fake = createFakeTransport({ [HOME]: { body: HOME_PAGE } });
      const service: CrawlerService = new CrawlerService({
        createCoordinator: () =>
          new CrawlCoordinator({
            fetcher: new PageFetcher({ timeoutMs: 1000, perDomainConcurrency: 2, userAgent: 'test-agent', transport: fake.transport }),
            extractor: new LinkExtractor(),
            scorer: new RuleBasedScorer(),
            reRanker: new PassthroughReRanker(),
            concurrency: 2,
            fetchTimeoutMs: 1000,
          }),
        getStore: () => store,
        emitProgress: (event) => {
          if (event.message.startsWith('Depth ')) {
            snapshots.set(event.message.slice(0, 7), service.status(event.jobId));
          }
        },
        generateId: () => 'job-live',
      });

      service.submit(CONFIG);
      await service.waitForJob('job-live');

      const afterSeeds = snapshots.get('Depth 0');
      expect(afterSeeds?.status).toBe(CrawlJobStatus.RUNNING);
      expect(afterSeeds?.resultCount).toBe(4);
      expect(afterSeeds?.stats?.pagesFetched).toBe(1);
      expect(afterSeeds?.stats?.pagesFailed).toBe(0);

      const afterChildren = snapshots.get('Depth 1');
      expect(afterChildren?.status).toBe(CrawlJobStatus.RUNNING);
      expect(afterChildren?.stats?.fetchFailures.http).toBeGreaterThan(0);
    });

    it('should fail a job whose seeds all fail', async () => {
      const service = createService({});

      const { id } = service.submit(CONFIG);
      const job = await service.waitForJob(id);

      expect(job?.status).toBe(CrawlJobStatus.FAILED);
      expect(job?.error).toBe('Every seed URL failed to fetch');
      expect(store.size).toBe(0);
      expect(events[events.length - 1].message).toBe('Crawl failed: Every seed URL failed to fetch');
    });

    it('should fail a job whose coordinator cannot be built', async () => {
      const service = new CrawlerService({
        createCoordinator: () => {
          throw new Error('provider misconfigured');
        },
        getStore: () => store,
        emitProgress: (event) => events.push(event),
        generateId: () => 'job-x',
      });

      service.submit(CONFIG);
      const job = await service.waitForJob('job-x');

      expect(job?.status).toBe(CrawlJobStatus.FAILED);
      expect(job?.error).toBe('provider misconfigured');
    });

    it('should keep the crawl status when storage fails', async () => {
      const service = createService({ [HOME]: { body: HOME_PAGE } }, { store: new FailingLinkRepository() });

      const { id } = service.submit(CONFIG);
      const job = await service.waitForJob(id);

      expect(job?.status).toBe(CrawlJobStatus.DONE);
      expect(job?.storedCount).toBe(0);
      expect(job?.error).toBe('Storage failed: disk full');
      expect(service.getResults(id).total).toBe(4);
    });
  });

  describe('status and results', () => {
    it('should return null for an unknown job', () => {
      const service = createService({});

      expect(service.status('missing')).toBeNull();
    });

    it('should hand out copies', async () => {
      const service = createService({ [HOME]: { body: HOME_PAGE } });
      const { id } = service.submit(CONFIG);
      await service.waitForJob(id);

      const snapshot = service.status(id);
      snapshot?.seedUrls.push('https://other.org/');

      expect(service.status(id)?.seedUrls).toEqual([HOME]);
    });

    it('should page through the ranked results', async () => {
      const service = createService({ [HOME]: { body: HOME_PAGE } });
      const { id } = service.submit(CONFIG);
      await service.waitForJob(id);

      const page = service.getResults(id, { limit: 2, offset: 1 });

      expect(page.total).toBe(4);
      expect(page.results.map((link) => link.url)).toEqual([
        'https://example.gov/contact',
        'https://example.gov/finance',
      ]);
      expect(service.getAllResults(id)).toHaveLength(4);
    });

    it('should reject results for an unknown job', () => {
      const service = createService({});

      expect(() => service.getResults('missing')).toThrow('Crawl job not found');
    });

    it('should list jobs', async () => {
      const service = createService({ [HOME]: { body: HOME_PAGE } });
      const first = service.submit(CONFIG);
      const second = service.submit(CONFIG);
      await Promise.all([service.waitForJob(first.id), service.waitForJob(second.id)]);

      expect(service.listJobs().map((job) => job.id).sort()).toEqual(['job-1', 'job-2']);
    });
  });

  describe('retention', () => {
    it('should drop the oldest finished jobs beyond the cap', async () => {
      const service = createService({ [HOME]: { body: HOME_PAGE } }, { maxRetainedJobs: 2 });

      for (let index = 0; index < 3; index++) {
        const { id } = service.submit(CONFIG);
        await service.waitForJob(id);
      }

      expect(service.status('job-1')).toBeNull();
      expect(() => service.getResults('job-1')).toThrow('Crawl job not found');
      expect(service.listJobs().map((job) => job.id).sort()).toEqual(['job-2', 'job-3']);
      expect(service.getResults('job-3').total).toBe(4);
    });

    it('should never drop a job that is still running', async () => {
      const slowSeed = 'https://slow.example.gov/';
      const service = createService(
        { [HOME]: { body: HOME_PAGE }, [slowSeed]: { body: HOME_PAGE, delayMs: 200 } },
        { maxRetainedJobs: 1 }
      );

      const slow = service.submit({ ...CONFIG, seedUrls: [slowSeed], maxDepth: 0 });
      const fast = service.submit({ ...CONFIG, maxDepth: 0 });
      await service.waitForJob(fast.id);

      expect(service.status(slow.id)?.status).toBe(CrawlJobStatus.RUNNING);
      expect(service.status(fast.id)?.status).toBe(CrawlJobStatus.DONE);

      await service.waitForJob(slow.id);

      expect(service.status(fast.id)).toBeNull();
      expect(service.status(slow.id)?.status).toBe(CrawlJobStatus.DONE);
    });
  });

  describe('cancel', () => {
    it('should stop a job before its seeds are fetched', async () => {
      const service = createService({ [HOME]: { body: HOME_PAGE, delayMs: 500 } });

      const { id } = service.submit(CONFIG);
      const requested = service.cancel(id);
      const job = await service.waitForJob(id);

      expect(requested.cancelled).toBe(true);
      expect(job?.status).toBe(CrawlJobStatus.FAILED);
      expect(job?.cancelled).toBe(true);
      expect(job?.error).toBe('Cancelled before any seed was fetched');
      expect(requests).toHaveLength(0);
    });

    it('should abort a fetch in flight', async () => {
      const service = createService({ [HOME]: { body: HOME_PAGE, delayMs: 500 } });

      const { id } = service.submit(CONFIG);
      await new Promise((resolve) => setTimeout(resolve, 20));
      service.cancel(id);
      const job = await service.waitForJob(id);

      expect(requests).toEqual([HOME]);
      expect(job?.status).toBe(CrawlJobStatus.FAILED);
      expect(job?.stats?.pagesCancelled).toBe(1);
    });

    it('should leave a finished job unchanged', async () => {
      const service = createService({ [HOME]: { body: HOME_PAGE } });
      const { id } = service.submit(CONFIG);
      await service.waitForJob(id);

      const job = service.cancel(id);

      expect(job.status).toBe(CrawlJobStatus.DONE);
      expect(job.cancelled).toBe(false);
    });

    it('should reject an unknown job', () => {
      const service = createService({});

      expect(() => service.cancel('missing')).toThrow('Crawl job not found');
    });
  });
});
