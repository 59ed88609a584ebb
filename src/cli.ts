#!/usr/bin/env node
/**
 * Command-line crawl: runs one job in process and prints the ranked links
 */

import { Command } from 'commander';
import { env } from './config/env';
import { CrawlJob, CrawlJobStatus, errorMessage, ScoredLink } from './lib/crawling';
import { disconnectDB } from './lib/mongo';
import { CrawlerService, CrawlerServiceDeps } from './modules/crawler/crawler.service';
import { CrawlValidationError, validateCrawlRequest } from './modules/crawler/crawler.validation';
import { initializeLinkStore } from './modules/links/links.store';

export interface CliOptions {
  keywords?: string;
  maxDepth?: string;
  minScore?: string;
  maxLinks?: string;
  maxPages?: string;
  llm: boolean;
  db: boolean;
  json?: boolean;
}

/**
 * One line per link: score, classification, URL, then the page it was found on
 */
export function formatResults(links: readonly ScoredLink[]): string {
  if (links.length === 0) {
    return 'No links met the minimum score.';
  }

  return links
    .map((link, index) => {
      const rank = String(index + 1).padStart(3, ' ');
      const semantic = link.llmScore !== undefined ? ` (llm ${link.llmScore.toFixed(2)})` : '';
      return `${rank}. ${link.finalScore.toFixed(4)}  ${link.classification.padEnd(8, ' ')}  ${link.url}${semantic}\n       from ${link.sourceUrl}`;
    })
    .join('\n');
}

export function formatSummary(job: CrawlJob): string {
  const stats = job.stats;
  const lines = [
    `Job ${job.id}: ${job.status}${job.cancelled ? ' (cancelled)' : ''}`,
    `Links recorded: ${job.resultCount}, stored: ${job.storedCount}`,
  ];
  if (stats) {
    lines.push(
      `Pages fetched: ${stats.pagesFetched}, failed: ${stats.pagesFailed}, depth reached: ${stats.depthReached}`,
      `Classification fallbacks: ${stats.classificationFallbacks} of ${stats.classificationRequested}`
    );
  }
  if (job.error) {
    lines.push(`Error: ${job.error}`);
  }
  return lines.join('\n');
}

/**
 * Send console.log and console.info to stderr until the returned function runs
 */
function routeLogsToStderr(): () => void {
  const { log, info } = console;
  console.log = console.error;
  console.info = console.error;
  return () => {
    console.log = log;
    console.info = info;
  };
}

/**
 * Run one crawl and print it. With --json, stdout carries only the JSON document.
 */
export async function runCrawl(
  seeds: string[],
  options: CliOptions,
  deps: Partial<Pick<CrawlerServiceDeps, 'createCoordinator' | 'generateId'>> = {}
): Promise<number> {
  const restoreConsole = options.json ? routeLogsToStderr() : undefined;
  try {
    return await crawlAndPrint(seeds, options, deps);
  } finally {
    restoreConsole?.();
  }
}

async function crawlAndPrint(
  seeds: string[],
  options: CliOptions,
  deps: Partial<Pick<CrawlerServiceDeps, 'createCoordinator' | 'generateId'>>
): Promise<number> {
  const config = validateCrawlRequest({
    seedUrls: seeds,
    keywords: options.keywords,
    maxDepth: options.maxDepth,
    minScore: options.minScore,
    maxLinksPerPage: options.maxLinks,
    maxPages: options.maxPages,
    useLlm: options.llm,
  });

  await initializeLinkStore(options.db);
  const service = new CrawlerService({
    ...deps,
    emitProgress: (event) => {
      if (!options.json) {
        console.log(`[${event.status}] ${event.message}`);
      }
    },
  });

  const submitted = service.submit(config);
  const onInterrupt = (): void => {
    console.log('Interrupted, cancelling crawl...');
    service.cancel(submitted.id);
  };
  process.once('SIGINT', onInterrupt);

  const job = await service.waitForJob(submitted.id);
  process.removeListener('SIGINT', onInterrupt);
  if (!job) {
    throw new Error(`Job ${submitted.id} disappeared`);
  }

  const results = service.getAllResults(job.id);
  if (options.json) {
    process.stdout.write(`${JSON.stringify({ job, results }, null, 2)}\n`);
  } else {
    console.log('');
    console.log(formatResults(results));
    console.log('');
    console.log(formatSummary(job));
  }

  return job.status === CrawlJobStatus.DONE ? 0 : 1;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('link-crawler')
    .description('Crawl seed pages and rank discovered links by topic relevance')
    .version('1.0.0')
    .argument('<seeds...>', 'Seed URL(s) to start crawling from')
    .option('-k, --keywords <list>', 'Comma-separated topic keywords', env.CRAWL_KEYWORDS.join(','))
    .option('-d, --max-depth <n>', 'Maximum crawl depth', String(env.CRAWL_MAX_DEPTH))
    .option('-s, --min-score <x>', 'Minimum final score to record a link (0-1)', String(env.CRAWL_MIN_SCORE))
    .option('-l, --max-links <n>', 'Maximum links taken from each page', String(env.CRAWL_MAX_LINKS_PER_PAGE))
    .option('-p, --max-pages <n>', 'Maximum pages visited per job', String(env.CRAWL_MAX_PAGES))
    .option('--no-llm', 'Disable semantic re-ranking')
    .option('--no-db', 'Keep results in memory instead of MongoDB')
    .option('--json', 'Print the job and results as JSON');

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();
  program.parse(process.argv);

  try {
    const exitCode = await runCrawl(program.args, program.opts<CliOptions>());
    await disconnectDB();
    process.exit(exitCode);
  } catch (error) {
    if (error instanceof CrawlValidationError) {
      error.errors.forEach((message) => console.error(`Invalid input: ${message}`));
    } else {
      console.error('Fatal Error:', errorMessage(error));
    }
    await disconnectDB();
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Fatal Error:', errorMessage(error));
    process.exit(1);
  });
}
