/**
 * In-Memory Link Repository
 * Used when MongoDB is unreachable and by the CLI/tests
 */

import { ScoredLink } from '../../lib/crawling';
import { clampLimit, clampOffset, createLinkComparator, matchesFilter, toStoredLink } from './links.query';
import { DomainCount, LinkQueryFilter, LinkStore, StoredLink } from './links.types';

export class MemoryLinkRepository implements LinkStore {
  readonly name = 'memory';
  private links: Map<string, StoredLink> = new Map();

  async upsert(link: ScoredLink, jobId?: string): Promise<StoredLink> {
    const stored = toStoredLink(link, jobId, new Date());
    this.links.set(stored.url, stored);
    return stored;
  }

  async upsertMany(links: readonly ScoredLink[], jobId?: string): Promise<number> {
    const storedAt = new Date();
    for (const link of links) {
      const stored = toStoredLink(link, jobId, storedAt);
      this.links.set(stored.url, stored);
    }
    return links.length;
  }

  async query(filter: LinkQueryFilter = {}): Promise<StoredLink[]> {
    const offset = clampOffset(filter.offset);
    return this.filtered(filter).slice(offset, offset + clampLimit(filter.limit));
  }

  async count(filter: LinkQueryFilter = {}): Promise<number> {
    return this.filtered(filter).length;
  }

  async countDomains(filter: Pick<LinkQueryFilter, 'minScore'> = {}): Promise<DomainCount[]> {
    const counts = new Map<string, number>();
    for (const link of this.filtered(filter)) {
      if (!link.domain) {
        continue;
      }
      counts.set(link.domain, (counts.get(link.domain) ?? 0) + 1);
    }

    return Array.from(counts.entries())
      .map(([domain, count]) => ({ domain, count }))
      .sort((a, b) => b.count - a.count || (a.domain < b.domain ? -1 : a.domain > b.domain ? 1 : 0));
  }

  clear(): void {
    this.links.clear();
  }

  get size(): number {
    return this.links.size;
  }

  private filtered(filter: LinkQueryFilter): StoredLink[] {
    return Array.from(this.links.values())
      .filter((link) => matchesFilter(link, filter))
      .sort(createLinkComparator(filter.sort, filter.order));
  }
}
