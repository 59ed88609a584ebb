/**
 * URL Normalization Utilities
 * Canonical URL form used for every uniqueness comparison in a crawl
 */

import { InvalidUrlError } from './crawl-errors';

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:', 'mailto:', 'tel:']);
const HTTP_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Normalize a URL: resolve against base, lowercase scheme and host,
 * drop default port and fragment, collapse duplicate slashes, drop the
 * trailing slash (except root) and sort query parameters.
 *
 * @throws InvalidUrlError when the URL cannot be parsed or uses an unsupported scheme
 */
export function normalizeUrl(rawUrl: string, baseUrl?: string): string {
  const trimmed = rawUrl.trim();
  if (!trimmed) {
    throw new InvalidUrlError(rawUrl, 'empty URL');
  }

  let urlObj: URL;
  try {
    urlObj = baseUrl ? new URL(trimmed, baseUrl) : new URL(trimmed);
  } catch {
    throw new InvalidUrlError(rawUrl, 'unparseable');
  }

  if (!SUPPORTED_PROTOCOLS.has(urlObj.protocol)) {
    throw new InvalidUrlError(rawUrl, `unsupported scheme ${urlObj.protocol}`);
  }

  // Remove fragment
  urlObj.hash = '';

  if (!HTTP_PROTOCOLS.has(urlObj.protocol)) {
    return urlObj.href;
  }

  if (!urlObj.hostname) {
    throw new InvalidUrlError(rawUrl, 'missing host');
  }

  // Sort query parameters
  if (urlObj.search) {
    const sortedParams = Array.from(urlObj.searchParams.entries()).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0
    );
    urlObj.search = '';
    sortedParams.forEach(([key, value]) => {
      urlObj.searchParams.append(key, value);
    });
  }

  // Collapse duplicate slashes, then drop the trailing one (except for root)
  let pathname = urlObj.pathname.replace(/\/{2,}/g, '/');
  if (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }
  urlObj.pathname = pathname;

  return urlObj.href;
}

/**
 * Normalize without throwing; null for invalid input
 */
export function tryNormalizeUrl(rawUrl: string, baseUrl?: string): string | null {
  try {
    return normalizeUrl(rawUrl, baseUrl);
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      return null;
    }
    throw error;
  }
}

/**
 * Whether the URL can be fetched over HTTP(S)
 */
export function isHttpUrl(url: string): boolean {
  try {
    return HTTP_PROTOCOLS.has(new URL(url).protocol);
  } catch {
    return false;
  }
}

/**
 * Extract host from URL, without the www. prefix
 */
export function extractDomain(url: string): string {
  try {
    const urlObj = new URL(url);
    let hostname = urlObj.hostname.toLowerCase();
    if (hostname.startsWith('www.')) {
      hostname = hostname.substring(4);
    }
    return hostname;
  } catch {
    return '';
  }
}

