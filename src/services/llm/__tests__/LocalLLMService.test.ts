import { describe, it, expect, vi } from 'vitest';
import { LocalLLMService } from '../LocalLLMService.js';
import { GenerationError } from '../../../utils/errors.js';
import type { LocalSettings } from '../../../config/validation.js';

const settings: LocalSettings = { url: 'http://localhost:11434/api/generate', model: 'llama3', timeoutMs: 5_000 };
const prompt = { system: 'system text', user: 'user text' };

const reply = (body: string, status = 200) => vi.fn<typeof fetch>().mockResolvedValue(new Response(body, { status }));

const kindOf = async (promise: Promise<unknown>): Promise<string | undefined> => {
  try {
    await promise;
    return undefined;
  } catch (error) {
    return error instanceof GenerationError ? error.kind : 'not a GenerationError';
  }
};

describe('LocalLLMService', () => {
  it('should post the combined prompt without streaming', async () => {
    const fetchFn = reply(JSON.stringify({ response: '[{"a":1}]' }));
    const service = new LocalLLMService(settings, fetchFn);

    const text = await service.generate(prompt, 5);

    expect(text).toBe('[{"a":1}]');
    expect(fetchFn).toHaveBeenCalledOnce();
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(settings.url);
    expect(init?.method).toBe('POST');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'llama3',
      prompt: 'system text\n\nuser text',
      stream: false,
    });
  });

  it('should fall back to a text field', async () => {
    const service = new LocalLLMService(settings, reply(JSON.stringify({ text: '[]' })));
    await expect(service.generate(prompt, 1)).resolves.toBe('[]');
  });

  it('should map HTTP failures to error kinds', async () => {
    expect(await kindOf(new LocalLLMService(settings, reply('no', 401)).generate(prompt, 1))).toBe('UNAUTHORIZED');
    expect(await kindOf(new LocalLLMService(settings, reply('slow down', 429)).generate(prompt, 1))).toBe('RATE_LIMITED');
    expect(await kindOf(new LocalLLMService(settings, reply('gateway', 504)).generate(prompt, 1))).toBe('TIMEOUT');
    expect(await kindOf(new LocalLLMService(settings, reply('model not found', 404)).generate(prompt, 1))).toBe('UNREACHABLE');
  });

  it('should treat an unexpected body as malformed', async () => {
    expect(await kindOf(new LocalLLMService(settings, reply('<html>')).generate(prompt, 1))).toBe('MALFORMED');
    expect(await kindOf(new LocalLLMService(settings, reply('{"done":true}')).generate(prompt, 1))).toBe('MALFORMED');
  });

  it('should map transport failures', async () => {
    const refused = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const timedOut = vi.fn<typeof fetch>().mockRejectedValue(new DOMException('The operation timed out.', 'TimeoutError'));

    expect(await kindOf(new LocalLLMService(settings, refused).generate(prompt, 1))).toBe('UNREACHABLE');
    expect(await kindOf(new LocalLLMService(settings, timedOut).generate(prompt, 1))).toBe('TIMEOUT');
  });
});
