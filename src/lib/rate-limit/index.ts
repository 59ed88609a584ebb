/**
 * Rate Limit System
 * Main export file for rate limiting
 */

export * from './rate-limit.types';
export * from './rate-limit.manager';
export * from './token-bucket';
