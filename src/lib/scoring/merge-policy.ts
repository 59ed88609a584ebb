/**
 * Score Merge Policy
 * Reconciles the rule-based score with an optional semantic score.
 *
 * OVERRIDE (default): the semantic score, once obtained, replaces the rule score.
 * BLEND: weighted average, llmWeight * llmScore + (1 - llmWeight) * ruleScore.
 * Without a semantic score both policies return the rule score unchanged.
 */

import { roundScore } from './rule-based.scorer';

export enum MergeStrategy {
  OVERRIDE = 'override',
  BLEND = 'blend',
}

export interface MergePolicy {
  strategy: MergeStrategy;
  /**
   * Weight of the semantic score under BLEND (0-1)
   */
  llmWeight: number;
}

export const DEFAULT_MERGE_POLICY: Readonly<MergePolicy> = {
  strategy: MergeStrategy.OVERRIDE,
  llmWeight: 0.7,
};

export function mergeScores(
  ruleScore: number,
  llmScore: number | undefined,
  policy: Readonly<MergePolicy> = DEFAULT_MERGE_POLICY
): number {
  if (llmScore === undefined) {
    return ruleScore;
  }

  if (policy.strategy === MergeStrategy.BLEND) {
    const weight = Math.min(Math.max(policy.llmWeight, 0), 1);
    return roundScore(weight * llmScore + (1 - weight) * ruleScore);
  }

  return llmScore;
}

/**
 * Build a policy from configuration values; unknown names fall back to OVERRIDE
 */
export function parseMergePolicy(name: string, llmWeight: number): MergePolicy {
  const strategy = name.toLowerCase() === MergeStrategy.BLEND ? MergeStrategy.BLEND : MergeStrategy.OVERRIDE;
  return {
    strategy,
    llmWeight: Number.isFinite(llmWeight) ? llmWeight : DEFAULT_MERGE_POLICY.llmWeight,
  };
}
