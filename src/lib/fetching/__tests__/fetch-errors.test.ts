/**
 * Fetch Error Classification Tests
 */

import { classifyFetchError, httpFailure, isHtmlContentType } from '../fetch-errors';
import { FetchFailureType } from '../fetcher.types';

describe('classifyFetchError', () => {
  it('should prefer cancellation over any other reading', () => {
    const failure = classifyFetchError(new Error('socket timeout'), { timedOut: true, cancelled: true });
    expect(failure.type).toBe(FetchFailureType.CANCELLED);
  });

  it('should recognise timeouts from state or message', () => {
    expect(classifyFetchError(new Error('aborted'), { timedOut: true, cancelled: false }).type).toBe(
      FetchFailureType.TIMEOUT
    );
    expect(classifyFetchError(new Error('connect ETIMEDOUT'), { timedOut: false, cancelled: false }).type).toBe(
      FetchFailureType.TIMEOUT
    );
  });

  it('should include the cause in network error messages', () => {
    const error = new Error('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND example.invalid') });

    expect(classifyFetchError(error, { timedOut: false, cancelled: false })).toEqual({
      type: FetchFailureType.NETWORK_ERROR,
      message: 'fetch failed (getaddrinfo ENOTFOUND example.invalid)',
    });
  });
});

describe('httpFailure', () => {
  it('should describe common statuses', () => {
    expect(httpFailure(404).message).toBe('Page not found');
    expect(httpFailure(429).message).toBe('Rate limited by server');
    expect(httpFailure(418).message).toBe('Unexpected status 418');
  });
});

describe('isHtmlContentType', () => {
  it('should accept HTML and a missing header', () => {
    expect(isHtmlContentType('text/html; charset=utf-8')).toBe(true);
    expect(isHtmlContentType('')).toBe(true);
    expect(isHtmlContentType('application/pdf')).toBe(false);
  });
});
