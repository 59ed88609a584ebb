/**
 * Page Fetcher
 * Thin adapter over the HTTP transport: per-request timeout and a per-host concurrency cap
 */

import pLimit from 'p-limit';
import { extractDomain } from '../crawling/url-normalizer';
import { errorMessage } from '../crawling/crawl-errors';
import { classifyFetchError, httpFailure, isHtmlContentType } from './fetch-errors';
import {
  FetchOptions,
  FetchResult,
  HttpTransport,
  PageFetcherOptions,
  TransportRequest,
  TransportResponse,
} from './fetcher.types';

/**
 * Default transport: Node's global fetch
 */
export const globalFetchTransport: HttpTransport = async (
  url: string,
  request: TransportRequest
): Promise<TransportResponse> => {
  return fetch(url, {
    method: 'GET',
    headers: request.headers,
    redirect: 'follow',
    signal: request.signal,
  });
};

/**
 * Release a response body without downloading it
 */
async function discardBody(response: TransportResponse): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    console.warn(`Fetcher: could not release body of ${response.url}: ${errorMessage(error)}`);
  }
}

export class PageFetcher {
  private readonly domainLimits: Map<string, ReturnType<typeof pLimit>> = new Map();
  private readonly transport: HttpTransport;

  constructor(private readonly options: PageFetcherOptions) {
    this.transport = options.transport ?? globalFetchTransport;
  }

  /**
   * Fetch a page. Never throws: failures come back classified.
   * No retries; a failure is terminal for the task.
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const limit = this.limitFor(url);
    return limit(() => this.fetchOnce(url, options));
  }

  private limitFor(url: string): ReturnType<typeof pLimit> {
    const domain = extractDomain(url);
    let limit = this.domainLimits.get(domain);
    if (!limit) {
      limit = pLimit(Math.max(1, this.options.perDomainConcurrency));
      this.domainLimits.set(domain, limit);
    }
    return limit;
  }

  private async fetchOnce(url: string, options: FetchOptions): Promise<FetchResult> {
    const startTime = Date.now();
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const state = { timedOut: false, cancelled: false };

    if (options.signal?.aborted) {
      return {
        ok: false,
        url,
        error: classifyFetchError(null, { timedOut: false, cancelled: true }),
        duration: 0,
      };
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      state.timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCancel = (): void => {
      state.cancelled = true;
      controller.abort();
    };
    options.signal?.addEventListener('abort', onCancel, { once: true });

    try {
      const response = await this.transport(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.5',
        },
        signal: controller.signal,
      });

      if (response.status < 200 || response.status >= 300) {
        await discardBody(response);
        return {
          ok: false,
          url,
          error: httpFailure(response.status),
          duration: Date.now() - startTime,
        };
      }

      // Only HTML is parsed for links; other bodies are left unread
      const contentType = response.headers.get('content-type') || '';
      let body = '';
      if (isHtmlContentType(contentType)) {
        body = await response.text();
      } else {
        await discardBody(response);
      }

      return {
        ok: true,
        url,
        finalUrl: response.url || url,
        statusCode: response.status,
        contentType,
        body,
        fetchedAt: new Date(),
        duration: Date.now() - startTime,
      };
    } catch (error) {
      return {
        ok: false,
        url,
        error: classifyFetchError(error, state),
        duration: Date.now() - startTime,
      };
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onCancel);
    }
  }
}
