/**
 * Scoring Types
 * Type definitions for rule-based link scoring and score merging
 */

import { LinkClassification } from '../crawling/crawling.types';

/**
 * Weight of each named scoring signal
 */
export interface ScoringWeights {
  /**
   * Applied to every link
   */
  baseline: number;

  /**
   * First keyword occurrence in anchor or surrounding text
   */
  keywordFirstMatch: number;

  /**
   * Each further occurrence of the same keyword, up to keywordMatchCap
   */
  keywordRepeatMatch: number;

  /**
   * Occurrences counted per keyword
   */
  keywordMatchCap: number;

  /**
   * Keyword present in the URL itself
   */
  keywordInUrl: number;

  /**
   * Document file extension (.pdf, .xls, ...)
   */
  documentExtension: number;

  /**
   * Contact path or scheme (/contact, /staff, mailto:)
   */
  contactIndicator: number;

  /**
   * Weak contact hint (/about); does not change classification
   */
  weakContactIndicator: number;
}

export type ScoringSignalName =
  | 'baseline'
  | 'keyword-text'
  | 'keyword-url'
  | 'document-extension'
  | 'contact-indicator'
  | 'weak-contact-indicator';

export interface ScoringSignal {
  name: ScoringSignalName;
  contribution: number;
  detail?: string;
}

export interface LinkScoreInput {
  href: string;
  anchorText: string;
  surroundingText: string;
  keywords: readonly string[];
}

export interface LinkScoreResult {
  ruleScore: number;
  matchedKeywords: string[];
  classification: LinkClassification;
  signals: ScoringSignal[];
}
