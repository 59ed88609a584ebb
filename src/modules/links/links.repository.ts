/**
 * Link Repository
 * MongoDB-backed link store
 */

import { FilterQuery } from 'mongoose';
import { ScoredLink } from '../../lib/crawling';
import { ILinkRecord, LinkModel } from './links.model';
import {
  DEFAULT_SORT_FIELD,
  clampLimit,
  clampOffset,
  escapeRegex,
  normalizeDomain,
  resolveSortOrder,
  toStoredLink,
} from './links.query';
import { DomainCount, LinkQueryFilter, LinkStore, StoredLink } from './links.types';

/**
 * Translate a link filter into a MongoDB query
 */
export function buildLinkQuery(filter: LinkQueryFilter = {}): FilterQuery<ILinkRecord> {
  const query: FilterQuery<ILinkRecord> = {};

  if (filter.domain) {
    query.domain = normalizeDomain(filter.domain);
  }
  if (filter.minScore !== undefined) {
    query.finalScore = { $gte: filter.minScore };
  }
  if (filter.classification) {
    query.classification = filter.classification;
  }
  if (filter.sourceUrl) {
    query.sourceUrl = filter.sourceUrl;
  }
  if (filter.jobId) {
    query.jobId = filter.jobId;
  }
  if (filter.keyword) {
    const pattern = { $regex: escapeRegex(filter.keyword), $options: 'i' };
    query.$or = [{ anchorText: pattern }, { surroundingText: pattern }];
  }

  return query;
}

/**
 * Sort document for the requested order, url ascending breaking ties
 */
export function buildLinkSort(filter: Pick<LinkQueryFilter, 'sort' | 'order'> = {}): Record<string, 1 | -1> {
  const field = filter.sort ?? DEFAULT_SORT_FIELD;
  const direction = resolveSortOrder(field, filter.order) === 'asc' ? 1 : -1;
  return field === 'url' ? { url: direction } : { [field]: direction, url: 1 };
}

// Records written before path, query and surroundingText existed lack them
function fromRecord(record: ILinkRecord): StoredLink {
  return {
    url: record.url,
    domain: record.domain,
    path: record.path ?? '',
    query: record.query ?? '',
    sourceUrl: record.sourceUrl,
    depth: record.depth,
    anchorText: record.anchorText,
    surroundingText: record.surroundingText ?? '',
    ruleScore: record.ruleScore,
    llmScore: record.llmScore ?? undefined,
    llmReason: record.llmReason ?? undefined,
    finalScore: record.finalScore,
    matchedKeywords: record.matchedKeywords,
    classification: record.classification,
    jobId: record.jobId ?? undefined,
    storedAt: record.storedAt,
  };
}

export class MongoLinkRepository implements LinkStore {
  readonly name = 'mongodb';

  /**
   * Insert or replace the link stored under its URL
   */
  async upsert(link: ScoredLink, jobId?: string): Promise<StoredLink> {
    const stored = toStoredLink(link, jobId, new Date());
    await LinkModel.updateOne({ url: stored.url }, { $set: stored }, { upsert: true });
    return stored;
  }

  async upsertMany(links: readonly ScoredLink[], jobId?: string): Promise<number> {
    if (links.length === 0) {
      return 0;
    }

    const storedAt = new Date();
    const operations = links.map((link) => {
      const stored = toStoredLink(link, jobId, storedAt);
      return {
        updateOne: {
          filter: { url: stored.url },
          update: { $set: stored },
          upsert: true,
        },
      };
    });

    const result = await LinkModel.bulkWrite(operations, { ordered: false });
    const written = result.upsertedCount + result.modifiedCount;
    console.log(`Repository: Upserted ${links.length} link(s), ${written} written`);
    return links.length;
  }

  async query(filter: LinkQueryFilter = {}): Promise<StoredLink[]> {
    const records = await LinkModel.find(buildLinkQuery(filter))
      .sort(buildLinkSort(filter))
      .skip(clampOffset(filter.offset))
      .limit(clampLimit(filter.limit))
      .lean<ILinkRecord[]>()
      .exec();

    return records.map(fromRecord);
  }

  async count(filter: LinkQueryFilter = {}): Promise<number> {
    return LinkModel.countDocuments(buildLinkQuery(filter)).exec();
  }

  async countDomains(filter: Pick<LinkQueryFilter, 'minScore'> = {}): Promise<DomainCount[]> {
    const rows = await LinkModel.aggregate<{ _id: string; count: number }>([
      { $match: { ...buildLinkQuery(filter), domain: { $ne: '' } } },
      { $group: { _id: '$domain', count: { $sum: 1 } } },
      { $sort: { count: -1, _id: 1 } },
    ]).exec();

    return rows.map((row) => ({ domain: row._id, count: row.count }));
  }
}

export const mongoLinkRepository = new MongoLinkRepository();
