import type { IncidentDraft, IncidentRecord } from '../domain/entities/IncidentRecord.js';
import type { GenerationError } from '../utils/errors.js';

export const GENERATION_STATE_VERSION = 1;

export interface GenerationState {
  version: typeof GENERATION_STATE_VERSION;
  runId: string;
  target: number;
  records: IncidentRecord[];
  softErrorCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface SoftError {
  /** position of the element in the model's array; -1 when not tied to one */
  index: number;
  reason: 'unparseable' | 'invalid' | 'taxonomy' | 'duplicate' | 'truncated';
  issues: string[];
}

export interface ParsedBatch {
  drafts: IncidentDraft[];
  softErrors: SoftError[];
}

export interface GenerationPrompt {
  system: string;
  user: string;
}

export type RunPhase = 'idle' | 'requesting' | 'validating' | 'checkpointing' | 'done' | 'failed';

export type RunStatus = 'completed' | 'paused' | 'cancelled';

export interface GenerationRunResult {
  status: RunStatus;
  state: GenerationState;
  appended: number;
  batchesSucceeded: number;
  batchesFailed: number;
  softErrors: number;
  error?: Error;
}

export interface BatchReport {
  batchNumber: number;
  requested: number;
  appended: number;
  softErrors: number;
  total: number;
  target: number;
}

export interface RetryNotice {
  batchNumber: number;
  attempt: number;
  retriesLeft: number;
  error: GenerationError;
}

/** Receives progress from the orchestrator; every method is optional. */
export interface GenerationListener {
  onPhase?(phase: RunPhase, detail: { count: number; target: number }): void;
  onBatchComplete?(report: BatchReport): void;
  onRetry?(notice: RetryNotice): void;
}
