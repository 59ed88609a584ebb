/**
 * Link Extractor Tests
 */

import { LinkExtractor } from '../link-extractor';

describe('LinkExtractor', () => {
  const extractor = new LinkExtractor();
  const base = 'https://example.gov/finance/';

  it('should resolve links and capture anchor and surrounding text', () => {
    const html = `<p>Download the <a href="budget.pdf">FY2024 Budget</a> for details.</p>`;

    const result = extractor.extract(html, base, 10);

    expect(result.links).toEqual([
      {
        href: 'https://example.gov/finance/budget.pdf',
        rawHref: 'budget.pdf',
        anchorText: 'FY2024 Budget',
        surroundingText: 'Download the for details.',
      },
    ]);
    expect(result.degraded).toBe(false);
  });

  it('should skip empty, fragment and script links', () => {
    const html = `
      <a href="">empty</a>
      <a href="#top">top</a>
      <a href="javascript:void(0)">script</a>
      <a href="/contact">Contact</a>`;

    const result = extractor.extract(html, base, 10);

    expect(result.links.map((link) => link.href)).toEqual(['https://example.gov/contact']);
    expect(result.totalAnchors).toBe(4);
    expect(result.droppedAnchors).toBe(0);
  });

  it('should drop unsupported schemes and report the page as degraded', () => {
    const html = `<a href="ftp://example.gov/file">FTP</a><a href="/staff">Staff</a>`;

    const result = extractor.extract(html, base, 10);

    expect(result.links.map((link) => link.href)).toEqual(['https://example.gov/staff']);
    expect(result.droppedAnchors).toBe(1);
    expect(result.degraded).toBe(true);
  });

  it('should deduplicate links within a page', () => {
    const html = `<a href="/a">A</a><a href="/a#x">A again</a><a href="/b">B</a>`;

    const result = extractor.extract(html, base, 10);

    expect(result.links.map((link) => link.anchorText)).toEqual(['A', 'B']);
  });

  it('should keep the first links in document order up to the limit', () => {
    const html = `<a href="/one">1</a><a href="/two">2</a><a href="/three">3</a>`;

    const result = extractor.extract(html, base, 2);

    expect(result.links.map((link) => link.href)).toEqual([
      'https://example.gov/one',
      'https://example.gov/two',
    ]);
    expect(result.truncated).toBe(true);
  });

  it('should fall back to title, aria-label and image alt for anchor text', () => {
    const html = `
      <a href="/t" title="Titled"></a>
      <a href="/l" aria-label="Labelled"></a>
      <a href="/i"><img src="x.png" alt="Pictured"></a>`;

    const result = extractor.extract(html, base, 10);

    expect(result.links.map((link) => link.anchorText)).toEqual(['Titled', 'Labelled', 'Pictured']);
  });

  it('should extract what it can from malformed markup', () => {
    const html = `<div><a href="/budget">Budget<div></span><a href="/contact">Contact`;

    const result = extractor.extract(html, base, 10);

    expect(result.links.map((link) => link.href)).toEqual([
      'https://example.gov/budget',
      'https://example.gov/contact',
    ]);
  });
});
