/**
 * Crawl Pipeline Integration Tests
 * Request validation through crawling, re-ranking and storage, with an
 * in-process transport and classification backend
 */

import { CrawlerService } from '../../modules/crawler/crawler.service';
import { validateCrawlRequest } from '../../modules/crawler/crawler.validation';
import { MemoryLinkRepository } from '../../modules/links/links.memory-repository';
import { getLinkStore, setLinkStore } from '../../modules/links/links.store';
import { CrawlCoordinator } from '../../lib/crawling/crawl-coordinator';
import { CrawlJobStatus, LinkClassification } from '../../lib/crawling/crawling.types';
import { LinkExtractor } from '../../lib/crawling/link-extractor';
import { PageFetcher } from '../../lib/fetching/page-fetcher';
import { RuleBasedScorer } from '../../lib/scoring/rule-based.scorer';
import { PassthroughReRanker } from '../../lib/classification/passthrough.reranker';
import { SemanticGateway, createClassificationBreaker } from '../../lib/classification/semantic-gateway';
import { TokenBucket } from '../../lib/rate-limit/token-bucket';
import { formatResults } from '../../cli';
import { createFakeTransport, FakeClassificationProvider } from '../helpers/mocks';
import { HOME_PAGE, TEST_KEYWORDS } from '../helpers/fixtures';

describe('Crawl pipeline', () => {
  let provider: FakeClassificationProvider;
  let service: CrawlerService;
  let shutdown: () => void;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    setLinkStore(new MemoryLinkRepository());
    provider = new FakeClassificationProvider({
      'https://example.gov/contact': { score: 0.9, reason: 'Finance staff contacts' },
    });
    const breaker = createClassificationBreaker(provider, {
      timeout: 1000,
      errorThresholdPercentage: 50,
      resetTimeout: 1000,
      minimumRequests: 5,
    });
    shutdown = () => breaker.shutdown();
    const gateway = new SemanticGateway(
      provider,
      { bandLow: 0.3, bandHigh: 0.7, batchSize: 10, maxBatchesPerJob: 5 },
      new TokenBucket({ capacity: 5, refillPerSecond: 5 }),
      breaker
    );

    const { transport } = createFakeTransport({ 'https://example.gov/': { body: HOME_PAGE } });
    service = new CrawlerService({
      createCoordinator: (useLlm) =>
        new CrawlCoordinator({
          fetcher: new PageFetcher({ timeoutMs: 1000, perDomainConcurrency: 2, userAgent: 'test-agent', transport }),
          extractor: new LinkExtractor(),
          scorer: new RuleBasedScorer(),
          reRanker: useLlm ? gateway : new PassthroughReRanker(),
          concurrency: 4,
          fetchTimeoutMs: 1000,
        }),
      getStore: getLinkStore,
      emitProgress: () => undefined,
      generateId: () => 'job-1',
    });
  });

  afterEach(() => {
    shutdown();
    jest.restoreAllMocks();
  });

  async function crawl(body: Record<string, unknown>) {
    const config = validateCrawlRequest({ keywords: TEST_KEYWORDS, minScore: 0.1, maxDepth: 1, ...body });
    const { id } = service.submit(config);
    return service.waitForJob(id);
  }

  it('should rank and store links by rule score alone', async () => {
    const job = await crawl({ seedUrls: 'https://example.gov', useLlm: false });

    expect(job?.status).toBe(CrawlJobStatus.DONE);
    expect(provider.calls).toHaveLength(0);

    const stored = await getLinkStore().query({ minScore: 0.5 });
    expect(stored.map((link) => [link.url, link.finalScore])).toEqual([
      ['https://example.gov/budget.pdf', 0.8],
      ['https://example.gov/contact', 0.65],
    ]);
  });

  it('should promote a borderline link the classifier favours', async () => {
    const job = await crawl({ seedUrls: ['https://example.gov/'], useLlm: true });

    expect(job?.stats?.classificationRequested).toBe(2);
    expect(job?.stats?.classificationFallbacks).toBe(1);
    expect(provider.calls[0].map((item) => item.url)).toEqual([
      'https://example.gov/contact',
      'https://example.gov/finance',
    ]);

    const [top] = await getLinkStore().query({ limit: 1 });
    expect(top).toMatchObject({
      url: 'https://example.gov/contact',
      ruleScore: 0.65,
      llmScore: 0.9,
      llmReason: 'Finance staff contacts',
      finalScore: 0.9,
      classification: LinkClassification.CONTACT,
      domain: 'example.gov',
      jobId: 'job-1',
    });
  });

  it('should print the ranked list', async () => {
    await crawl({ seedUrls: 'https://example.gov', useLlm: true, minScore: 0.5 });

    expect(formatResults(service.getAllResults('job-1'))).toBe(
      [
        '  1. 0.9000  CONTACT   https://example.gov/contact (llm 0.90)',
        '       from https://example.gov/',
        '  2. 0.8000  DOCUMENT  https://example.gov/budget.pdf',
        '       from https://example.gov/',
      ].join('\n')
    );
  });

  it('should report an empty ranking', () => {
    expect(formatResults([])).toBe('No links met the minimum score.');
  });
});
