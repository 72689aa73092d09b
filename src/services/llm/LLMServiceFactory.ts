import { logger } from '../../utils/logger.js';
import type { LLMConfig } from '../../config/validation.js';
import type { LLMService } from './LLMService.interface.js';
import { LocalLLMService } from './LocalLLMService.js';
import { OpenAILLMService } from './OpenAILLMService.js';
import { GeminiLLMService } from './GeminiLLMService.js';

export class LLMServiceFactory {
  static createLLMService(llm: LLMConfig): LLMService {
    switch (llm.provider) {
      case 'local':
        logger.info({ url: llm.settings.url, model: llm.settings.model }, 'Initializing local LLM service');
        return new LocalLLMService(llm.settings);
      case 'hosted-chat':
        logger.info({ model: llm.settings.model }, 'Initializing OpenAI LLM service');
        return new OpenAILLMService(llm.settings);
      case 'hosted-generative':
        logger.info({ model: llm.settings.model }, 'Initializing Gemini LLM service');
        return new GeminiLLMService(llm.settings);
    }
  }
}
