/**
 * Rule-Based Scorer
 * Deterministic relevance score for a candidate link from named weighted signals
 */

import { LinkClassification } from '../crawling/crawling.types';
import {
  CONTACT_PATH_PATTERN,
  CONTACT_PROTOCOLS,
  DEFAULT_SCORING_WEIGHTS,
  DOCUMENT_EXTENSION_PATTERN,
  WEAK_CONTACT_PATH_PATTERN,
} from './scoring.rules';
import { LinkScoreInput, LinkScoreResult, ScoringSignal, ScoringWeights } from './scoring.types';

/**
 * Clamp to [0, 1] and round to 4 decimals
 */
export function roundScore(score: number): number {
  const clamped = Math.min(Math.max(score, 0), 1);
  return Math.round(clamped * 10000) / 10000;
}

/**
 * Non-overlapping occurrences of needle in haystack (both lowercase)
 */
function countOccurrences(haystack: string, needle: string): number {
  if (!needle) {
    return 0;
  }
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

interface ParsedTarget {
  protocol: string;
  pathname: string;
}

function parseTarget(href: string): ParsedTarget {
  try {
    const urlObj = new URL(href);
    return { protocol: urlObj.protocol, pathname: urlObj.pathname };
  } catch {
    return { protocol: '', pathname: href };
  }
}

export class RuleBasedScorer {
  private readonly weights: ScoringWeights;

  constructor(weights?: Partial<ScoringWeights>) {
    this.weights = { ...DEFAULT_SCORING_WEIGHTS, ...weights };
  }

  /**
   * Score a link. Pure: identical input always yields identical output.
   */
  score(input: LinkScoreInput): LinkScoreResult {
    const signals: ScoringSignal[] = [{ name: 'baseline', contribution: this.weights.baseline }];
    const matchedKeywords: string[] = [];

    const anchorLower = input.anchorText.toLowerCase();
    const surroundingLower = input.surroundingText.toLowerCase();
    const urlLower = input.href.toLowerCase();
    const target = parseTarget(input.href);

    const seenKeywords = new Set<string>();
    for (const keyword of input.keywords) {
      const keywordLower = keyword.trim().toLowerCase();
      if (!keywordLower || seenKeywords.has(keywordLower)) {
        continue;
      }
      seenKeywords.add(keywordLower);

      let matched = false;

      // Anchor and surrounding text are counted separately so a match cannot span them
      const occurrences = countOccurrences(anchorLower, keywordLower) + countOccurrences(surroundingLower, keywordLower);
      if (occurrences > 0) {
        const counted = Math.min(occurrences, this.weights.keywordMatchCap);
        signals.push({
          name: 'keyword-text',
          contribution: this.weights.keywordFirstMatch + (counted - 1) * this.weights.keywordRepeatMatch,
          detail: `${keyword.trim()} x${counted}`,
        });
        matched = true;
      }

      if (urlLower.includes(keywordLower)) {
        signals.push({ name: 'keyword-url', contribution: this.weights.keywordInUrl, detail: keyword.trim() });
        matched = true;
      }

      if (matched) {
        matchedKeywords.push(keyword.trim());
      }
    }

    let classification: LinkClassification;

    if (DOCUMENT_EXTENSION_PATTERN.test(target.pathname)) {
      signals.push({ name: 'document-extension', contribution: this.weights.documentExtension });
      classification = LinkClassification.DOCUMENT;
    } else if (CONTACT_PROTOCOLS.includes(target.protocol) || CONTACT_PATH_PATTERN.test(target.pathname)) {
      signals.push({ name: 'contact-indicator', contribution: this.weights.contactIndicator });
      classification = LinkClassification.CONTACT;
    } else {
      if (WEAK_CONTACT_PATH_PATTERN.test(target.pathname)) {
        signals.push({ name: 'weak-contact-indicator', contribution: this.weights.weakContactIndicator });
      }
      classification = matchedKeywords.length > 0 ? LinkClassification.GENERIC : LinkClassification.UNKNOWN;
    }

    const total = signals.reduce((sum, signal) => sum + signal.contribution, 0);

    return {
      ruleScore: roundScore(total),
      matchedKeywords,
      classification,
      signals,
    };
  }
}

export const ruleBasedScorer = new RuleBasedScorer();
