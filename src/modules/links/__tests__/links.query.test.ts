/**
 * Link Query Helper Tests
 */

import { clampLimit, clampOffset, escapeRegex, normalizeDomain, toStoredLink } from '../links.query';
import { createScoredLink } from '../../../__tests__/helpers/fixtures';
import { buildLinkQuery, buildLinkSort } from '../links.repository';
import { LinkClassification } from '../../../lib/crawling/crawling.types';

describe('link query helpers', () => {
  it('should clamp the page size', () => {
    expect(clampLimit(undefined)).toBe(100);
    expect(clampLimit(0)).toBe(100);
    expect(clampLimit(25.7)).toBe(25);
    expect(clampLimit(5000)).toBe(500);
  });

  it('should clamp the offset', () => {
    expect(clampOffset(-3)).toBe(0);
    expect(clampOffset(Number.NaN)).toBe(0);
    expect(clampOffset(40)).toBe(40);
  });

  it('should normalise domains and escape regex input', () => {
    expect(normalizeDomain(' WWW.Example.GOV ')).toBe('example.gov');
    expect(escapeRegex('c++ (v2)')).toBe('c\\+\\+ \\(v2\\)');
  });
});

describe('buildLinkQuery', () => {
  it('should return an empty query without filters', () => {
    expect(buildLinkQuery()).toEqual({});
  });

  it('should translate every filter field', () => {
    expect(
      buildLinkQuery({
        domain: 'www.Example.gov',
        minScore: 0.5,
        classification: LinkClassification.DOCUMENT,
        sourceUrl: 'https://example.gov/',
        keyword: 'a.b',
        jobId: 'job-1',
        limit: 10,
      })
    ).toEqual({
      domain: 'example.gov',
      finalScore: { $gte: 0.5 },
      classification: LinkClassification.DOCUMENT,
      sourceUrl: 'https://example.gov/',
      jobId: 'job-1',
      $or: [
        { anchorText: { $regex: 'a\\.b', $options: 'i' } },
        { surroundingText: { $regex: 'a\\.b', $options: 'i' } },
      ],
    });
  });

  it('should keep a zero minimum score', () => {
    expect(buildLinkQuery({ minScore: 0 })).toEqual({ finalScore: { $gte: 0 } });
  });
});

describe('buildLinkSort', () => {
  it('should sort by final score, highest first, by default', () => {
    expect(buildLinkSort()).toEqual({ finalScore: -1, url: 1 });
  });

  it('should honour the requested field and order', () => {
    expect(buildLinkSort({ sort: 'depth', order: 'asc' })).toEqual({ depth: 1, url: 1 });
    expect(buildLinkSort({ sort: 'domain' })).toEqual({ domain: 1, url: 1 });
    expect(buildLinkSort({ sort: 'url', order: 'desc' })).toEqual({ url: -1 });
  });
});

describe('toStoredLink', () => {
  it('should split the URL into domain, path and query', () => {
    const storedAt = new Date('2026-01-01T00:00:00Z');
    const stored = toStoredLink(
      createScoredLink({ url: 'https://www.example.gov/reports/2025?year=2025&page=2', surroundingText: 'Annual reports' }),
      'job-1',
      storedAt
    );

    expect(stored.domain).toBe('example.gov');
    expect(stored.path).toBe('/reports/2025');
    expect(stored.query).toBe('year=2025&page=2');
    expect(stored.surroundingText).toBe('Annual reports');
    expect(stored.storedAt).toBe(storedAt);
  });
});
