/**
 * Base LLM Classifier
 * Shared prompt construction and response parsing for LLM-backed providers
 */

import { ClassificationUnavailableError } from '../crawling/crawl-errors';
import { ClassificationItem, ClassificationProvider, ClassificationScore } from './classification.types';

const RESPONSE_LINE_PATTERN = /^\s*Link\s+(\d+)\s*:\s*\[?(\d*\.?\d+)\]?\s*(?:-\s*(.*))?$/i;
const MAX_CONTEXT_LENGTH = 300;

export abstract class BaseLLMClassifier implements ClassificationProvider {
  abstract readonly name: string;

  /**
   * Provider-specific LLM call
   */
  protected abstract callLLM(prompt: string, signal?: AbortSignal): Promise<{ text: string; modelName?: string }>;

  abstract isAvailable(): boolean;

  async classify(
    items: readonly ClassificationItem[],
    keywords: readonly string[],
    signal?: AbortSignal
  ): Promise<Map<string, ClassificationScore>> {
    if (items.length === 0) {
      return new Map();
    }

    if (!this.isAvailable()) {
      throw new ClassificationUnavailableError(`${this.name} API key not configured`);
    }

    const prompt = this.buildClassificationPrompt(items, keywords);
    const { text } = await this.callLLM(prompt, signal);
    const scores = this.parseClassificationResponse(text, items);

    if (scores.size === 0) {
      throw new ClassificationUnavailableError(
        `${this.name} response contained no usable scores: ${text.substring(0, 200)}`
      );
    }

    return scores;
  }

  protected buildClassificationPrompt(items: readonly ClassificationItem[], keywords: readonly string[]): string {
    const linksText = items
      .map((item, index) => {
        const context = item.surroundingText.substring(0, MAX_CONTEXT_LENGTH);
        return `Link ${index + 1}:\nURL: ${item.url}\nText: ${item.anchorText}\nContext: ${context}`;
      })
      .join('\n\n');

    return `Evaluate the following links by their relevance to these keywords: ${keywords.join(', ')}.
Favor links that lead to documents such as budgets and financial reports, or to contact details
for the staff responsible for them.

Score each link between 0.0 and 1.0:
- 1.0 = direct link to target content
- 0.7-0.9 = likely leads to target content within one or two clicks
- 0.4-0.6 = might lead to target content
- 0.0-0.3 = unlikely to lead to target content

Links to evaluate:

${linksText}

Respond with one line per link, replacing N with the link number:
Link N: <score> - <brief reason>`;
  }

  /**
   * Map "Link N: score - reason" lines back to item URLs. Unknown link
   * numbers and scores outside 0-1 are ignored.
   */
  protected parseClassificationResponse(
    text: string,
    items: readonly ClassificationItem[]
  ): Map<string, ClassificationScore> {
    const scores = new Map<string, ClassificationScore>();

    for (const line of text.split('\n')) {
      const match = RESPONSE_LINE_PATTERN.exec(line.replace(/\*/g, ''));
      if (!match) {
        continue;
      }

      const item = items[parseInt(match[1], 10) - 1];
      const score = parseFloat(match[2]);
      if (!item || Number.isNaN(score) || score < 0 || score > 1) {
        continue;
      }

      const reason = match[3]?.trim();
      scores.set(item.url, reason ? { score, reason } : { score });
    }

    return scores;
  }
}
