/**
 * Gemini Classifier
 * Scores link batches with Google Generative AI
 */

import { GoogleGenerativeAI, GenerativeModel } from '@google/generative-ai';
import { BaseLLMClassifier } from './llm-base.classifier';
import { ClassificationUnavailableError, errorMessage } from '../crawling/crawl-errors';
import { env } from '../../config/env';

export class GeminiClassifier extends BaseLLMClassifier {
  readonly name = 'Gemini';
  private model: GenerativeModel | null = null;

  constructor(
    private readonly apiKey: string | undefined = env.GEMINI_API_KEY,
    private readonly modelName: string = env.GEMINI_MODEL
  ) {
    super();
  }

  isAvailable(): boolean {
    return !!this.apiKey;
  }

  private getModel(apiKey: string): GenerativeModel {
    if (!this.model) {
      this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({
        model: this.modelName,
        generationConfig: { temperature: 0.2, maxOutputTokens: 2000 },
      });
    }
    return this.model;
  }

  protected async callLLM(prompt: string, signal?: AbortSignal): Promise<{ text: string; modelName?: string }> {
    if (!this.apiKey) {
      throw new ClassificationUnavailableError('Gemini API key not configured');
    }

    try {
      const result = await this.getModel(this.apiKey).generateContent(prompt, { signal });
      const text = result.response.text();
      if (!text) {
        throw new ClassificationUnavailableError('Empty response from Gemini');
      }
      return { text, modelName: this.modelName };
    } catch (error) {
      if (error instanceof ClassificationUnavailableError) {
        throw error;
      }
      throw new ClassificationUnavailableError(`Gemini API error: ${errorMessage(error)}`, error);
    }
  }
}
