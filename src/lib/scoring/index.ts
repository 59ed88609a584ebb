/**
 * Scoring
 * Main export file for link scoring
 */

export * from './scoring.types';
export * from './scoring.rules';
export * from './rule-based.scorer';
export * from './merge-policy';
