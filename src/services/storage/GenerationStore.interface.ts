import type { GenerationState } from '../../types/generation.types.js';

export interface GenerationStore {
  readonly location: string;
  /** `null` when there is no checkpoint yet; throws `CorruptStateError` for an unreadable one. */
  load(): Promise<GenerationState | null>;
  /** Replaces the whole checkpoint with `state`. */
  save(state: GenerationState): Promise<void>;
  clear(): Promise<void>;
}
