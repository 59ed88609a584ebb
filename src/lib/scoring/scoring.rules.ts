/**
 * Scoring Rules
 * Default weights and the URL patterns behind each signal
 */

import { ScoringWeights } from './scoring.types';

export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = {
  baseline: 0.05,
  keywordFirstMatch: 0.2,
  keywordRepeatMatch: 0.05,
  keywordMatchCap: 3,
  keywordInUrl: 0.15,
  documentExtension: 0.4,
  contactIndicator: 0.25,
  weakContactIndicator: 0.1,
};

export const DOCUMENT_EXTENSION_PATTERN = /\.(pdf|docx?|xlsx?|csv|pptx?|rtf|odt|ods|txt)$/i;

export const CONTACT_PATH_PATTERN = /\/(contact[\w-]*|staff[\w-]*|directory|people|team)(\/|\.|$)/i;

export const WEAK_CONTACT_PATH_PATTERN = /\/about[\w-]*(\/|\.|$)/i;

export const CONTACT_PROTOCOLS = ['mailto:', 'tel:'];
