import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { logger } from '../../utils/logger.js';
import { GenerationError } from '../../utils/errors.js';
import type { HostedChatSettings } from '../../config/validation.js';
import type { GenerationPrompt } from '../../types/generation.types.js';
import type { LLMService } from './LLMService.interface.js';

/** The slice of the OpenAI client this service touches. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export const createOpenAIClient = (settings: HostedChatSettings): OpenAI =>
  new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.url,
    timeout: settings.timeoutMs,
    maxRetries: 0,
  });

export function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) return error;

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new GenerationError('TIMEOUT', 'OpenAI request timed out', error);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new GenerationError('UNREACHABLE', `Cannot reach OpenAI: ${error.message}`, error);
  }
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return new GenerationError('UNAUTHORIZED', 'OpenAI rejected the API key', error);
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new GenerationError('RATE_LIMITED', 'OpenAI rate limit reached', error);
  }
  if (error instanceof OpenAI.APIError) {
    if (error.status === 408) {
      return new GenerationError('TIMEOUT', 'OpenAI request timed out', error);
    }
    return new GenerationError('UNREACHABLE', `OpenAI API error (${error.status ?? 'no status'})`, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new GenerationError('UNREACHABLE', `OpenAI request failed: ${message}`, error);
}

export class OpenAILLMService implements LLMService {
  readonly provider = 'hosted-chat' as const;
  private client: ChatCompletionClient;

  constructor(
    private readonly settings: HostedChatSettings,
    client?: ChatCompletionClient
  ) {
    this.client = client ?? createOpenAIClient(settings);
  }

  get model(): string {
    return this.settings.model;
  }

  async generate(prompt: GenerationPrompt, batchSize: number): Promise<string> {
    logger.debug({ model: this.settings.model, batchSize }, 'Sending generation request to OpenAI');

    let completion: ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.settings.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        temperature: this.settings.temperature,
      });
    } catch (error) {
      throw toGenerationError(error);
    }

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new GenerationError('MALFORMED', 'Empty response from OpenAI', {
        finishReason: completion.choices[0]?.finish_reason,
      });
    }

    logger.debug({ tokensUsed: completion.usage?.total_tokens }, 'OpenAI generation complete');
    return content;
  }
}
