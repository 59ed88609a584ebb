/**
 * Links Controller
 * HTTP request/response handling for stored link queries
 */

import { Request, Response } from 'express';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { LinkClassification } from '../../lib/crawling';
import { clampLimit, clampOffset } from './links.query';
import { getLinkStore } from './links.store';
import { ILinkListResponse, LINK_SORT_FIELDS, LinkQueryFilter, LinkSortField, SortOrder } from './links.types';

type QueryParams = Request['query'];

function queryString(query: QueryParams, name: string): string | undefined {
  const value = query[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function queryNumber(query: QueryParams, name: string): number | undefined {
  const value = queryString(query, name);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ApiError(400, `${name} must be a number`);
  }
  return parsed;
}

function isClassification(value: string): value is LinkClassification {
  return Object.values<string>(LinkClassification).includes(value);
}

function isSortField(value: string): value is LinkSortField {
  return LINK_SORT_FIELDS.some((field) => field === value);
}

function isSortOrder(value: string): value is SortOrder {
  return value === 'asc' || value === 'desc';
}

/**
 * Build a store filter from query-string parameters
 */
export function parseLinkFilter(query: QueryParams): LinkQueryFilter {
  const minScore = queryNumber(query, 'minScore');
  if (minScore !== undefined && (minScore < 0 || minScore > 1)) {
    throw new ApiError(400, 'minScore must be between 0 and 1');
  }

  const classificationParam = queryString(query, 'classification');
  let classification: LinkClassification | undefined;
  if (classificationParam !== undefined) {
    const upper = classificationParam.toUpperCase();
    if (!isClassification(upper)) {
      throw new ApiError(400, `classification must be one of ${Object.values(LinkClassification).join(', ')}`);
    }
    classification = upper;
  }

  const sort = queryString(query, 'sort');
  if (sort !== undefined && !isSortField(sort)) {
    throw new ApiError(400, `sort must be one of ${LINK_SORT_FIELDS.join(', ')}`);
  }

  const orderParam = queryString(query, 'order');
  const order = orderParam?.toLowerCase();
  if (order !== undefined && !isSortOrder(order)) {
    throw new ApiError(400, 'order must be asc or desc');
  }

  return {
    domain: queryString(query, 'domain'),
    minScore,
    classification,
    sourceUrl: queryString(query, 'sourceUrl'),
    keyword: queryString(query, 'keyword'),
    jobId: queryString(query, 'jobId'),
    sort,
    order,
    limit: clampLimit(queryNumber(query, 'limit')),
    offset: clampOffset(queryNumber(query, 'offset')),
  };
}

export class LinksController {
  /**
   * GET /api/links
   */
  getLinks = asyncHandler(async (req: Request, res: Response) => {
    const filter = parseLinkFilter(req.query);
    const store = getLinkStore();
    const [links, total] = await Promise.all([store.query(filter), store.count(filter)]);

    const response: ILinkListResponse = {
      success: true,
      links,
      total,
      limit: clampLimit(filter.limit),
      offset: clampOffset(filter.offset),
    };

    res.json(response);
  });

  /**
   * GET /api/links/count
   */
  getCount = asyncHandler(async (req: Request, res: Response) => {
    const total = await getLinkStore().count(parseLinkFilter(req.query));
    res.json({ success: true, total });
  });

  /**
   * GET /api/links/domains
   */
  getDomains = asyncHandler(async (req: Request, res: Response) => {
    const { minScore } = parseLinkFilter(req.query);
    const domains = await getLinkStore().countDomains({ minScore });
    res.json({ success: true, domains });
  });
}

export const linksController = new LinksController();
