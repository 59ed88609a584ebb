/**
 * Test Fixtures
 * Sample pages and links for testing
 */

import { LinkClassification, ScoredLink } from '../../lib/crawling/crawling.types';

export const TEST_KEYWORDS = ['Budget', 'Finance', 'Contact'];

/**
 * Home page of the sample municipal site: one document, one contact page,
 * one about page and one section page that links deeper
 */
export const HOME_PAGE = `<!DOCTYPE html>
<html>
<head><title>Sample Town</title></head>
<body>
  <ul>
    <li><a href="/budget.pdf">Budget</a></li>
    <li><a href="/contact">Contact Us</a></li>
    <li><a href="/about">About Us</a></li>
    <li><a href="/finance">Finance Department</a></li>
  </ul>
</body>
</html>`;

export const FINANCE_PAGE = `<html><body>
  <ul>
    <li><a href="/finance/annual-report.pdf">Annual report</a></li>
    <li><a href="/">Home</a></li>
    <li><a href="/finance/archive">Finance archive</a></li>
  </ul>
</body></html>`;

export const ARCHIVE_PAGE = `<html><body>
  <ul><li><a href="/finance/2019">Finance 2019</a></li></ul>
</body></html>`;

export function buildPage(hrefs: string[]): string {
  const items = hrefs.map((href) => `<li><a href="${href}">${href}</a></li>`).join('\n');
  return `<html><body><ul>${items}</ul></body></html>`;
}

export function createScoredLink(overrides: Partial<ScoredLink> = {}): ScoredLink {
  return {
    url: 'https://example.gov/budget.pdf',
    sourceUrl: 'https://example.gov/',
    depth: 1,
    anchorText: 'Budget',
    surroundingText: '',
    ruleScore: 0.8,
    finalScore: 0.8,
    matchedKeywords: ['Budget'],
    classification: LinkClassification.DOCUMENT,
    ...overrides,
  };
}
