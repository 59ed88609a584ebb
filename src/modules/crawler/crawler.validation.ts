/**
 * Crawl Job Validation
 * Turns an untrusted request body into a CrawlJobConfig
 */

import { env } from '../../config/env';
import { CrawlJobConfig, isHttpUrl, tryNormalizeUrl } from '../../lib/crawling';
import { ICreateCrawlJobRequest } from './crawler.types';

export const CRAWL_LIMITS = {
  maxSeeds: 50,
  maxDepth: 10,
  maxLinksPerPage: 1000,
  maxPages: 10000,
  maxKeywords: 50,
} as const;

export class CrawlValidationError extends Error {
  constructor(public readonly errors: string[]) {
    super(errors.join('; '));
    this.name = 'CrawlValidationError';
  }
}

function toList(value: unknown): unknown[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value === 'string') {
    return value.split(',');
  }
  return [value];
}

function toNumber(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : NaN;
}

function toBoolean(value: unknown): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  return undefined;
}

function checkInteger(
  errors: string[],
  name: string,
  value: number | undefined,
  min: number,
  max: number
): void {
  if (value !== undefined && (!Number.isInteger(value) || value < min || value > max)) {
    errors.push(`${name} must be an integer between ${min} and ${max}`);
  }
}

/**
 * Validate a crawl request, filling gaps from configured defaults.
 *
 * @throws CrawlValidationError listing every problem found
 */
export function validateCrawlRequest(body: ICreateCrawlJobRequest): CrawlJobConfig {
  const errors: string[] = [];

  const rawSeeds = toList(body.seedUrls ?? body.seedUrl) ?? [];
  const seedUrls: string[] = [];
  for (const rawSeed of rawSeeds) {
    if (typeof rawSeed !== 'string' || rawSeed.trim() === '') {
      errors.push('seedUrls must contain non-empty strings');
      continue;
    }
    const normalized = tryNormalizeUrl(rawSeed);
    if (!normalized || !isHttpUrl(normalized)) {
      errors.push(`Invalid seed URL: ${rawSeed}`);
      continue;
    }
    if (!seedUrls.includes(normalized)) {
      seedUrls.push(normalized);
    }
  }
  if (rawSeeds.length === 0) {
    errors.push('At least one seed URL is required');
  }
  if (seedUrls.length > CRAWL_LIMITS.maxSeeds) {
    errors.push(`At most ${CRAWL_LIMITS.maxSeeds} seed URLs are allowed`);
  }

  const rawKeywords = toList(body.keywords);
  const keywords: string[] = [];
  for (const keyword of rawKeywords ?? env.CRAWL_KEYWORDS) {
    if (typeof keyword !== 'string') {
      errors.push('keywords must be strings');
      continue;
    }
    const trimmed = keyword.trim();
    if (trimmed && !keywords.some((existing) => existing.toLowerCase() === trimmed.toLowerCase())) {
      keywords.push(trimmed);
    }
  }
  if (keywords.length === 0) {
    errors.push('At least one keyword is required');
  }
  if (keywords.length > CRAWL_LIMITS.maxKeywords) {
    errors.push(`At most ${CRAWL_LIMITS.maxKeywords} keywords are allowed`);
  }

  const maxDepth = toNumber(body.maxDepth);
  checkInteger(errors, 'maxDepth', maxDepth, 0, CRAWL_LIMITS.maxDepth);

  const maxLinksPerPage = toNumber(body.maxLinksPerPage);
  checkInteger(errors, 'maxLinksPerPage', maxLinksPerPage, 1, CRAWL_LIMITS.maxLinksPerPage);

  const maxPages = toNumber(body.maxPages);
  checkInteger(errors, 'maxPages', maxPages, 1, CRAWL_LIMITS.maxPages);

  const minScore = toNumber(body.minScore);
  if (minScore !== undefined && (Number.isNaN(minScore) || minScore < 0 || minScore > 1)) {
    errors.push('minScore must be a number between 0 and 1');
  }

  const useLlm = toBoolean(body.useLlm);
  if (body.useLlm !== undefined && useLlm === undefined) {
    errors.push('useLlm must be a boolean');
  }

  if (errors.length > 0) {
    throw new CrawlValidationError(errors);
  }

  return {
    seedUrls,
    keywords,
    maxDepth: maxDepth ?? env.CRAWL_MAX_DEPTH,
    minScore: minScore ?? env.CRAWL_MIN_SCORE,
    maxLinksPerPage: maxLinksPerPage ?? env.CRAWL_MAX_LINKS_PER_PAGE,
    useLlm: useLlm ?? true,
    maxPages: maxPages ?? env.CRAWL_MAX_PAGES,
  };
}
