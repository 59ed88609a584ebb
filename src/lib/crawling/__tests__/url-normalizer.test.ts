/**
 * URL Normalizer Tests
 */

import { InvalidUrlError } from '../crawl-errors';
import { extractDomain, isHttpUrl, normalizeUrl, tryNormalizeUrl } from '../url-normalizer';

describe('normalizeUrl', () => {
  it('should lowercase scheme and host and drop the default port', () => {
    expect(normalizeUrl('HTTPS://Example.GOV:443/Budget')).toBe('https://example.gov/Budget');
    expect(normalizeUrl('http://example.gov:80/')).toBe('http://example.gov/');
  });

  it('should keep a non-default port', () => {
    expect(normalizeUrl('http://example.gov:8080/a')).toBe('http://example.gov:8080/a');
  });

  it('should resolve relative references against the base', () => {
    expect(normalizeUrl('../reports/2023.pdf', 'https://example.gov/finance/budget/')).toBe(
      'https://example.gov/finance/reports/2023.pdf'
    );
    expect(normalizeUrl('/contact', 'https://example.gov/about')).toBe('https://example.gov/contact');
  });

  it('should strip fragments', () => {
    expect(normalizeUrl('https://example.gov/page#section-2')).toBe('https://example.gov/page');
  });

  it('should collapse duplicate slashes and drop the trailing slash', () => {
    expect(normalizeUrl('https://example.gov//finance///reports/')).toBe('https://example.gov/finance/reports');
  });

  it('should keep the root slash', () => {
    expect(normalizeUrl('https://example.gov')).toBe('https://example.gov/');
  });

  it('should sort query parameters', () => {
    expect(normalizeUrl('https://example.gov/search?q=budget&a=1')).toBe('https://example.gov/search?a=1&q=budget');
  });

  it('should accept mailto and tel links unchanged apart from the fragment', () => {
    expect(normalizeUrl('mailto:clerk@example.gov')).toBe('mailto:clerk@example.gov');
    expect(normalizeUrl('tel:+15550100')).toBe('tel:+15550100');
  });

  it('should be idempotent', () => {
    const inputs = [
      'HTTP://Example.gov:80//a//b/?z=1&y=2#top',
      'https://example.gov/finance/reports/',
      'https://example.gov/?b=2&a=1',
    ];
    for (const input of inputs) {
      const once = normalizeUrl(input);
      expect(normalizeUrl(once)).toBe(once);
    }
  });

  it('should reject unsupported schemes', () => {
    expect(() => normalizeUrl('ftp://example.gov/file.pdf')).toThrow(InvalidUrlError);
    expect(() => normalizeUrl('javascript:void(0)')).toThrow(InvalidUrlError);
  });

  it('should reject empty and unparseable input', () => {
    expect(() => normalizeUrl('   ')).toThrow('empty URL');
    expect(() => normalizeUrl('not a url')).toThrow('unparseable');
  });
});

describe('tryNormalizeUrl', () => {
  it('should return null for invalid input', () => {
    expect(tryNormalizeUrl('not a url')).toBeNull();
    expect(tryNormalizeUrl('/relative')).toBeNull();
  });

  it('should return the canonical form for valid input', () => {
    expect(tryNormalizeUrl('/relative', 'https://example.gov')).toBe('https://example.gov/relative');
  });
});

describe('domain helpers', () => {
  it('should extract the host without www', () => {
    expect(extractDomain('https://www.Example.gov/a')).toBe('example.gov');
    expect(extractDomain('not a url')).toBe('');
  });

  it('should recognise fetchable URLs', () => {
    expect(isHttpUrl('https://example.gov/')).toBe(true);
    expect(isHttpUrl('mailto:clerk@example.gov')).toBe(false);
  });
});
