import type { ProviderName } from '../../config/validation.js';
import type { GenerationPrompt } from '../../types/generation.types.js';

/**
 * One capability over every backend: turn a prompt into the model's raw text.
 * Implementations translate transport failures into `GenerationError` kinds
 * and never retry; retry policy belongs to the orchestrator.
 */
export interface LLMService {
  readonly provider: ProviderName;
  readonly model: string;
  generate(prompt: GenerationPrompt, batchSize: number): Promise<string>;
}
