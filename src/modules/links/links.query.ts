/**
 * Link query helpers shared by both store implementations
 */

import { extractDomain, ScoredLink } from '../../lib/crawling';
import { DEFAULT_QUERY_LIMIT, LinkQueryFilter, LinkSortField, MAX_QUERY_LIMIT, SortOrder, StoredLink } from './links.types';

export const DEFAULT_SORT_FIELD: LinkSortField = 'finalScore';

export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit) || limit < 1) {
    return DEFAULT_QUERY_LIMIT;
  }
  return Math.min(Math.floor(limit), MAX_QUERY_LIMIT);
}

export function clampOffset(offset: number | undefined): number {
  if (offset === undefined || !Number.isFinite(offset) || offset < 0) {
    return 0;
  }
  return Math.floor(offset);
}

export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/^www\./, '');
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Score fields sort high to low unless asked otherwise; the rest sort A-Z
 */
export function resolveSortOrder(field: LinkSortField, order: SortOrder | undefined): SortOrder {
  if (order) {
    return order;
  }
  return field === 'url' || field === 'domain' ? 'asc' : 'desc';
}

function splitUrl(url: string): { path: string; query: string } {
  try {
    const urlObj = new URL(url);
    return { path: urlObj.pathname, query: urlObj.search.replace(/^\?/, '') };
  } catch {
    return { path: '', query: '' };
  }
}

export function toStoredLink(link: ScoredLink, jobId: string | undefined, storedAt: Date): StoredLink {
  return {
    url: link.url,
    sourceUrl: link.sourceUrl,
    depth: link.depth,
    anchorText: link.anchorText,
    surroundingText: link.surroundingText,
    ruleScore: link.ruleScore,
    llmScore: link.llmScore,
    llmReason: link.llmReason,
    finalScore: link.finalScore,
    matchedKeywords: [...link.matchedKeywords],
    classification: link.classification,
    domain: extractDomain(link.url),
    ...splitUrl(link.url),
    jobId,
    storedAt,
  };
}

/**
 * Whether a stored link passes every filter field that is set
 */
export function matchesFilter(link: StoredLink, filter: LinkQueryFilter): boolean {
  if (filter.domain && link.domain !== normalizeDomain(filter.domain)) {
    return false;
  }
  if (filter.minScore !== undefined && link.finalScore < filter.minScore) {
    return false;
  }
  if (filter.classification && link.classification !== filter.classification) {
    return false;
  }
  if (filter.sourceUrl && link.sourceUrl !== filter.sourceUrl) {
    return false;
  }
  if (filter.jobId && link.jobId !== filter.jobId) {
    return false;
  }
  if (filter.keyword) {
    const keyword = filter.keyword.toLowerCase();
    if (!link.anchorText.toLowerCase().includes(keyword) && !link.surroundingText.toLowerCase().includes(keyword)) {
      return false;
    }
  }
  return true;
}

function compareValues(a: string | number | Date | undefined, b: string | number | Date | undefined): number {
  if (a === undefined || b === undefined) {
    // Missing values sort lowest, as MongoDB orders them
    return a === b ? 0 : a === undefined ? -1 : 1;
  }
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  const leftText = String(left);
  const rightText = String(right);
  return leftText < rightText ? -1 : leftText > rightText ? 1 : 0;
}

function compareUrls(a: StoredLink, b: StoredLink): number {
  return a.url < b.url ? -1 : a.url > b.url ? 1 : 0;
}

/**
 * Comparator for the requested sort; ties fall back to url ascending
 */
export function createLinkComparator(
  field: LinkSortField = DEFAULT_SORT_FIELD,
  order?: SortOrder
): (a: StoredLink, b: StoredLink) => number {
  const direction = resolveSortOrder(field, order) === 'asc' ? 1 : -1;
  return (a, b) => direction * compareValues(a[field], b[field]) || compareUrls(a, b);
}
