/**
 * OpenAI Classifier
 * Scores link batches with the OpenAI chat completions API
 */

import OpenAI from 'openai';
import { BaseLLMClassifier } from './llm-base.classifier';
import { ClassificationUnavailableError, errorMessage } from '../crawling/crawl-errors';
import { env } from '../../config/env';

export class OpenAIClassifier extends BaseLLMClassifier {
  readonly name = 'OpenAI';
  private client: OpenAI | null = null;

  constructor(
    private readonly apiKey: string | undefined = env.OPENAI_API_KEY,
    private readonly model: string = env.OPENAI_MODEL
  ) {
    super();
  }

  isAvailable(): boolean {
    return !!this.apiKey;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  protected async callLLM(prompt: string, signal?: AbortSignal): Promise<{ text: string; modelName?: string }> {
    try {
      const response = await this.getClient().chat.completions.create(
        {
          model: this.model,
          messages: [
            {
              role: 'system',
              content: 'You evaluate how relevant web links are to a topic and answer in the requested line format.',
            },
            { role: 'user', content: prompt },
          ],
          temperature: 0.2,
          max_tokens: 2000,
        },
        { signal }
      );

      const text = response.choices[0]?.message?.content ?? '';
      if (!text) {
        throw new ClassificationUnavailableError('Empty response from OpenAI');
      }

      return { text, modelName: this.model };
    } catch (error) {
      if (error instanceof ClassificationUnavailableError) {
        throw error;
      }
      if (error instanceof OpenAI.APIError && error.status === 429) {
        throw new ClassificationUnavailableError('OpenAI rate limit exceeded', error);
      }
      if (error instanceof OpenAI.APIError && error.status === 401) {
        throw new ClassificationUnavailableError('OpenAI API key is invalid', error);
      }
      throw new ClassificationUnavailableError(`OpenAI API error: ${errorMessage(error)}`, error);
    }
  }
}
