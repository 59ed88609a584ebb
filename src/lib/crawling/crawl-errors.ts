/**
 * Crawl Error Taxonomy
 * Every per-task failure is absorbed at the task boundary; only JobFailure ends a job.
 */

export enum CrawlErrorType {
  INVALID_URL = 'INVALID_URL',
  FETCH_FAILURE = 'FETCH_FAILURE',
  EXTRACTION_DEGRADED = 'EXTRACTION_DEGRADED',
  CLASSIFICATION_UNAVAILABLE = 'CLASSIFICATION_UNAVAILABLE',
  JOB_FAILURE = 'JOB_FAILURE',
}

export abstract class CrawlError extends Error {
  abstract readonly type: CrawlErrorType;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidUrlError extends CrawlError {
  readonly type = CrawlErrorType.INVALID_URL;

  constructor(public readonly rawUrl: string, reason: string) {
    super(`Invalid URL "${rawUrl}": ${reason}`);
  }
}

export class ExtractionDegradedError extends CrawlError {
  readonly type = CrawlErrorType.EXTRACTION_DEGRADED;

  constructor(public readonly url: string, public readonly droppedAnchors: number, reason?: string) {
    super(reason ?? `Extraction degraded for ${url}: ${droppedAnchors} anchor(s) dropped`);
  }
}

export class ClassificationUnavailableError extends CrawlError {
  readonly type = CrawlErrorType.CLASSIFICATION_UNAVAILABLE;

  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
  }
}

export class JobFailureError extends CrawlError {
  readonly type = CrawlErrorType.JOB_FAILURE;
}

/**
 * Extract a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
