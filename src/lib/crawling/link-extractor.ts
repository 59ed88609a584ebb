/**
 * Link Extractor
 * Pulls candidate outbound links, with their anchor and surrounding text, out of fetched HTML
 */

import * as cheerio from 'cheerio';
import { RawLink } from './crawling.types';
import { tryNormalizeUrl } from './url-normalizer';

const MAX_SURROUNDING_TEXT_LENGTH = 300;
const SKIPPED_HREF_PREFIXES = ['#', 'javascript:', 'data:'];

export interface ExtractionResult {
  links: RawLink[];
  /**
   * Anchors with an href attribute found in the document
   */
  totalAnchors: number;
  /**
   * Anchors whose href could not be resolved to a supported URL
   */
  droppedAnchors: number;
  /**
   * Whether links were cut at maxLinksPerPage
   */
  truncated: boolean;
  /**
   * Markup could only be partially used
   */
  degraded: boolean;
  degradedReason?: string;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export class LinkExtractor {
  /**
   * Extract up to maxLinksPerPage links in document order.
   * Never throws: unusable markup yields whatever anchors were parseable.
   */
  extract(html: string, baseUrl: string, maxLinksPerPage: number): ExtractionResult {
    const result: ExtractionResult = {
      links: [],
      totalAnchors: 0,
      droppedAnchors: 0,
      truncated: false,
      degraded: false,
    };

    let $: cheerio.CheerioAPI;
    try {
      $ = cheerio.load(html);
    } catch (error) {
      result.degraded = true;
      result.degradedReason = error instanceof Error ? error.message : 'Unparseable markup';
      return result;
    }

    const seen = new Set<string>();
    const limit = Math.max(0, maxLinksPerPage);

    $('a[href]').each((_, el) => {
      result.totalAnchors++;

      if (result.links.length >= limit) {
        result.truncated = true;
        return;
      }

      const rawHref = ($(el).attr('href') || '').trim();
      const lowerHref = rawHref.toLowerCase();
      if (!rawHref || SKIPPED_HREF_PREFIXES.some((prefix) => lowerHref.startsWith(prefix))) {
        return;
      }

      const href = tryNormalizeUrl(rawHref, baseUrl);
      if (!href) {
        result.droppedAnchors++;
        return;
      }

      if (seen.has(href)) {
        return;
      }
      seen.add(href);

      const anchor = $(el);
      const anchorText =
        collapseWhitespace(anchor.text()) ||
        collapseWhitespace(anchor.attr('title') || '') ||
        collapseWhitespace(anchor.attr('aria-label') || '') ||
        collapseWhitespace(anchor.find('img[alt]').first().attr('alt') || '');

      result.links.push({
        href,
        rawHref,
        anchorText,
        surroundingText: this.surroundingText(anchor.parent().text(), anchor.text()),
      });
    });

    if (result.droppedAnchors > 0) {
      result.degraded = true;
      result.degradedReason = `${result.droppedAnchors} anchor(s) with unusable href`;
    }

    return result;
  }

  /**
   * Parent text with the anchor's own text removed once
   */
  private surroundingText(parentText: string, ownText: string): string {
    const parent = collapseWhitespace(parentText);
    const own = collapseWhitespace(ownText);
    const index = own ? parent.indexOf(own) : -1;
    const remainder = index >= 0 ? parent.slice(0, index) + ' ' + parent.slice(index + own.length) : parent;
    return collapseWhitespace(remainder).slice(0, MAX_SURROUNDING_TEXT_LENGTH);
  }
}

export const linkExtractor = new LinkExtractor();
