import {
  GoogleGenerativeAI,
  GoogleGenerativeAIError,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
} from '@google/generative-ai';
import { logger } from '../../utils/logger.js';
import { GenerationError } from '../../utils/errors.js';
import type { HostedGenerativeSettings } from '../../config/validation.js';
import type { GenerationPrompt } from '../../types/generation.types.js';
import type { LLMService } from './LLMService.interface.js';

/** What `GenerativeModel` offers that this service uses. */
export interface GenerativeModelClient {
  generateContent(prompt: string): Promise<{ response: { text(): string } }>;
}

export type GenerativeModelFactory = (systemInstruction: string) => GenerativeModelClient;

const defaultModelFactory =
  (settings: HostedGenerativeSettings): GenerativeModelFactory =>
  systemInstruction =>
    new GoogleGenerativeAI(settings.apiKey).getGenerativeModel(
      {
        model: settings.model,
        systemInstruction,
        generationConfig: {
          temperature: settings.temperature,
          responseMimeType: 'application/json',
        },
      },
      { timeout: settings.timeoutMs }
    );

export function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) return error;

  if (error instanceof GoogleGenerativeAIFetchError) {
    const status = error.status ?? 0;
    // an invalid key comes back as 400 API_KEY_INVALID rather than 401
    if (status === 401 || status === 403 || (status === 400 && /api key/i.test(error.message))) {
      return new GenerationError('UNAUTHORIZED', 'Gemini rejected the API key', error);
    }
    if (status === 429) {
      return new GenerationError('RATE_LIMITED', 'Gemini quota or rate limit reached', error);
    }
    if (status === 408 || status === 504) {
      return new GenerationError('TIMEOUT', 'Gemini request timed out', error);
    }
    return new GenerationError('UNREACHABLE', `Gemini API error (${status || 'no status'})`, error);
  }
  if (error instanceof GoogleGenerativeAIResponseError) {
    return new GenerationError('MALFORMED', `Gemini returned no usable content: ${error.message}`, error);
  }
  if (error instanceof GoogleGenerativeAIError && /abort|timed? ?out/i.test(error.message)) {
    return new GenerationError('TIMEOUT', 'Gemini request timed out', error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new GenerationError('UNREACHABLE', `Gemini request failed: ${message}`, error);
}

export class GeminiLLMService implements LLMService {
  readonly provider = 'hosted-generative' as const;
  private createModel: GenerativeModelFactory;

  constructor(
    private readonly settings: HostedGenerativeSettings,
    modelFactory?: GenerativeModelFactory
  ) {
    this.createModel = modelFactory ?? defaultModelFactory(settings);
  }

  get model(): string {
    return this.settings.model;
  }

  async generate(prompt: GenerationPrompt, batchSize: number): Promise<string> {
    logger.debug({ model: this.settings.model, batchSize }, 'Sending generation request to Gemini');

    try {
      const result = await this.createModel(prompt.system).generateContent(prompt.user);
      const text = result.response.text();
      if (!text.trim()) {
        throw new GenerationError('MALFORMED', 'Empty response from Gemini');
      }
      return text;
    } catch (error) {
      throw toGenerationError(error);
    }
  }
}
