/**
 * Crawl Policy
 * Pluggable admission hook consulted before a URL is enqueued (robots rules, allowlists)
 */

import { extractDomain } from './url-normalizer';

export interface CrawlPolicy {
  readonly name: string;
  isAllowed(url: string): boolean | Promise<boolean>;
}

/**
 * Admits every URL
 */
export class AllowAllPolicy implements CrawlPolicy {
  readonly name = 'allow-all';

  isAllowed(): boolean {
    return true;
  }
}

/**
 * Admits URLs whose host equals or is a subdomain of an allowed domain
 */
export class DomainAllowlistPolicy implements CrawlPolicy {
  readonly name = 'domain-allowlist';
  private readonly allowedDomains: string[];

  constructor(allowedDomains: string[]) {
    this.allowedDomains = allowedDomains.map((domain) => domain.toLowerCase().replace(/^www\./, ''));
  }

  isAllowed(url: string): boolean {
    const domain = extractDomain(url);
    if (!domain) {
      return false;
    }
    return this.allowedDomains.some(
      (allowedDomain) => domain === allowedDomain || domain.endsWith(`.${allowedDomain}`)
    );
  }
}
