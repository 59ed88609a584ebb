/**
 * Fetch Error Classification
 * Maps transport errors and HTTP statuses onto Timeout | HttpError | NetworkError | Cancelled
 */

import { FetchFailure, FetchFailureType } from './fetcher.types';

const TIMEOUT_MARKERS = ['timeout', 'ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT'];

function describe(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

/**
 * Classify a rejected transport call
 */
export function classifyFetchError(
  error: unknown,
  state: { timedOut: boolean; cancelled: boolean }
): FetchFailure {
  if (state.cancelled) {
    return {
      type: FetchFailureType.CANCELLED,
      message: 'Request cancelled',
    };
  }

  const message = describe(error);

  if (state.timedOut || TIMEOUT_MARKERS.some((marker) => message.includes(marker))) {
    return {
      type: FetchFailureType.TIMEOUT,
      message: 'Request timed out',
    };
  }

  return {
    type: FetchFailureType.NETWORK_ERROR,
    message: message || 'Network connection failed',
  };
}

/**
 * Failure for a completed request with a non-2xx status
 */
export function httpFailure(statusCode: number): FetchFailure {
  let message: string;
  if (statusCode === 429) {
    message = 'Rate limited by server';
  } else if (statusCode === 401 || statusCode === 403) {
    message = 'Access denied';
  } else if (statusCode === 404) {
    message = 'Page not found';
  } else if (statusCode >= 500) {
    message = 'Server error';
  } else {
    message = `Unexpected status ${statusCode}`;
  }

  return {
    type: FetchFailureType.HTTP_ERROR,
    message,
    statusCode,
  };
}

export function isHtmlContentType(contentType: string): boolean {
  if (!contentType) {
    return true; // Servers that omit the header are treated as HTML
  }
  const lower = contentType.toLowerCase();
  return lower.includes('text/html') || lower.includes('application/xhtml');
}
