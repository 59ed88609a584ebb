/**
 * Fetching
 * Main export file for the page fetcher
 */

export * from './fetcher.types';
export * from './fetch-errors';
export * from './page-fetcher';
