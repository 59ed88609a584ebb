/**
 * Links Controller Query Parsing Tests
 */

import { parseLinkFilter } from '../links.controller';
import { ApiError } from '../../../middleware/error-handler';
import { LinkClassification } from '../../../lib/crawling/crawling.types';

describe('parseLinkFilter', () => {
  it('should apply defaults for an empty query string', () => {
    expect(parseLinkFilter({})).toEqual({
      domain: undefined,
      minScore: undefined,
      classification: undefined,
      sourceUrl: undefined,
      keyword: undefined,
      jobId: undefined,
      sort: undefined,
      order: undefined,
      limit: 100,
      offset: 0,
    });
  });

  it('should read sort, order and classification', () => {
    const filter = parseLinkFilter({ sort: 'depth', order: 'ASC', classification: 'contact', keyword: ' budget ' });

    expect(filter.sort).toBe('depth');
    expect(filter.order).toBe('asc');
    expect(filter.classification).toBe(LinkClassification.CONTACT);
    expect(filter.keyword).toBe('budget');
  });

  it('should reject an unknown sort field', () => {
    expect(() => parseLinkFilter({ sort: 'password' })).toThrow(ApiError);
    expect(() => parseLinkFilter({ sort: 'password' })).toThrow(
      'sort must be one of finalScore, ruleScore, llmScore, depth, url, domain, storedAt'
    );
  });

  it('should reject an unknown order', () => {
    expect(() => parseLinkFilter({ order: 'sideways' })).toThrow('order must be asc or desc');
  });

  it('should reject a minimum score outside 0 to 1', () => {
    expect(() => parseLinkFilter({ minScore: '1.5' })).toThrow('minScore must be between 0 and 1');
  });
});
