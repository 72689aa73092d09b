import { logger } from '../../utils/logger.js';
import { GenerationError } from '../../utils/errors.js';
import type { LocalSettings } from '../../config/validation.js';
import type { GenerationPrompt } from '../../types/generation.types.js';
import type { LLMService } from './LLMService.interface.js';

type FetchFn = typeof fetch;

const statusToError = (status: number, body: string): GenerationError => {
  const detail = { status, body: body.slice(0, 500) };
  if (status === 401 || status === 403) {
    return new GenerationError('UNAUTHORIZED', `Local LLM server rejected the request (${status})`, detail);
  }
  if (status === 429) {
    return new GenerationError('RATE_LIMITED', 'Local LLM server is rate limiting', detail);
  }
  if (status === 408 || status === 504) {
    return new GenerationError('TIMEOUT', `Local LLM server timed out (${status})`, detail);
  }
  return new GenerationError('UNREACHABLE', `Local LLM server answered ${status}`, detail);
};

/** Ollama-style `/api/generate` endpoint, or anything that speaks the same envelope. */
export class LocalLLMService implements LLMService {
  readonly provider = 'local' as const;

  constructor(
    private readonly settings: LocalSettings,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  get model(): string {
    return this.settings.model;
  }

  async generate(prompt: GenerationPrompt, batchSize: number): Promise<string> {
    logger.debug({ url: this.settings.url, model: this.settings.model, batchSize }, 'Sending generation request to local LLM');
    return this.request(prompt);
  }

  private async request(prompt: GenerationPrompt): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(this.settings.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.settings.model,
          prompt: `${prompt.system}\n\n${prompt.user}`,
          stream: false,
        }),
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });
    } catch (error) {
      throw this.transportError(error);
    }

    const body = await response.text();
    if (!response.ok) {
      throw statusToError(response.status, body);
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      throw new GenerationError('MALFORMED', 'Local LLM server returned non-JSON body', error);
    }

    const content = this.unwrap(data);
    if (content === null) {
      throw new GenerationError('MALFORMED', 'Local LLM response has no "response" or "text" field', {
        keys: typeof data === 'object' && data !== null ? Object.keys(data) : [],
      });
    }
    return content;
  }

  private unwrap(data: unknown): string | null {
    if (typeof data !== 'object' || data === null) return null;
    if ('response' in data && typeof data.response === 'string') return data.response;
    if ('text' in data && typeof data.text === 'string') return data.text;
    return null;
  }

  private transportError(error: unknown): GenerationError {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new GenerationError('TIMEOUT', `Local LLM did not answer within ${this.settings.timeoutMs}ms`, error);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new GenerationError('UNREACHABLE', `Cannot reach local LLM at ${this.settings.url}: ${message}`, error);
  }
}
