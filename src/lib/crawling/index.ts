/**
 * Crawling System
 * Main export file for crawl coordination
 */

export * from './crawling.types';
export * from './crawl-errors';
export * from './url-normalizer';
export * from './visited-set';
export * from './link-extractor';
export * from './crawl-frontier';
export * from './crawl-policy';
export * from './crawling-statistics';
export * from './result-aggregator';
export * from './crawl-coordinator';
