/**
 * Link Storage Types
 */

import { LinkClassification, ScoredLink } from '../../lib/crawling';

export const DEFAULT_QUERY_LIMIT = 100;
export const MAX_QUERY_LIMIT = 500;

/**
 * A scored link as persisted; the URL is the storage key
 */
export interface StoredLink extends Omit<ScoredLink, 'matchedKeywords'> {
  matchedKeywords: string[];
  domain: string;
  path: string;
  query: string;
  jobId?: string;
  storedAt: Date;
}

export const LINK_SORT_FIELDS = ['finalScore', 'ruleScore', 'llmScore', 'depth', 'url', 'domain', 'storedAt'] as const;

export type LinkSortField = (typeof LINK_SORT_FIELDS)[number];

export type SortOrder = 'asc' | 'desc';

export interface LinkQueryFilter {
  domain?: string;
  minScore?: number;
  classification?: LinkClassification;
  sourceUrl?: string;
  /**
   * Case-insensitive substring of the anchor or surrounding text
   */
  keyword?: string;
  jobId?: string;
  sort?: LinkSortField;
  order?: SortOrder;
  limit?: number;
  offset?: number;
}

export interface DomainCount {
  domain: string;
  count: number;
}

/**
 * Storage collaborator for scored links. Writes are upserts keyed by URL,
 * last write wins; queries return links by finalScore desc, url asc unless
 * another sort is requested.
 */
export interface LinkStore {
  readonly name: string;
  upsert(link: ScoredLink, jobId?: string): Promise<StoredLink>;
  upsertMany(links: readonly ScoredLink[], jobId?: string): Promise<number>;
  query(filter?: LinkQueryFilter): Promise<StoredLink[]>;
  count(filter?: LinkQueryFilter): Promise<number>;
  countDomains(filter?: Pick<LinkQueryFilter, 'minScore'>): Promise<DomainCount[]>;
}

export interface ILinkListResponse {
  success: boolean;
  links: StoredLink[];
  total: number;
  limit: number;
  offset: number;
}
