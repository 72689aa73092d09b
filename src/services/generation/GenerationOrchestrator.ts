import pLimit from 'p-limit';
import pRetry, { AbortError } from 'p-retry';
import { logger } from '../../utils/logger.js';
import { BatchFailedError, GenerationError } from '../../utils/errors.js';
import { MODEL_FIELDS, formatIncidentNumber, type IncidentRecord } from '../../domain/entities/IncidentRecord.js';
import type { CategoryTaxonomy } from '../../domain/entities/CategoryTaxonomy.js';
import type { BusinessHours } from '../../domain/durations.js';
import type { LLMService } from '../llm/LLMService.interface.js';
import type { GenerationStore } from '../storage/GenerationStore.interface.js';
import { buildIncidentPrompt } from '../llm/prompts/incident-generation.js';
import type {
  GenerationListener,
  GenerationRunResult,
  GenerationState,
  ParsedBatch,
  RunPhase,
  RunStatus,
  SoftError,
} from '../../types/generation.types.js';
import { ResponseParser } from './ResponseParser.js';
import { fingerprint, maxSequence } from './state.js';
import { raceAbort, wait } from './retry.js';

export interface OrchestratorOptions {
  batchSize: number;
  numWorkers: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  rateLimitDelayMs: number;
  onBatchFailure: 'pause' | 'abort';
  closedOnly: boolean;
  taxonomy?: CategoryTaxonomy;
  businessHours?: BusinessHours;
  /** Extra wait before retrying a rate-limited batch; swapped out in tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RunOptions {
  signal?: AbortSignal;
  listener?: GenerationListener;
}

type BatchOutcome =
  | { kind: 'merged'; appended: number }
  | { kind: 'failed'; error: GenerationError }
  | { kind: 'discarded' };

interface RunContext {
  state: GenerationState;
  signal: AbortSignal;
  listener?: GenerationListener;
  checkpoint: ReturnType<typeof pLimit>;
  halt: (error: Error) => void;
  haltError: () => Error | undefined;
  counters: { appended: number; succeeded: number; failed: number; softErrors: number };
}

/**
 * Drives batches until the state reaches its target:
 * idle → requesting → validating → checkpointing → (requesting | done | failed).
 *
 * The state object passed to `run` is the only copy of progress and is
 * mutated in place, strictly after the checkpoint holding the new records
 * has been written.
 */
export class GenerationOrchestrator {
  private phase: RunPhase = 'idle';
  private parser: ResponseParser;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private batchCounter = 0;

  constructor(
    private llmService: LLMService,
    private store: GenerationStore,
    private options: OrchestratorOptions
  ) {
    this.parser = new ResponseParser({
      taxonomy: options.taxonomy,
      businessHours: options.businessHours,
      closedOnly: options.closedOnly,
    });
    this.sleep = options.sleep ?? wait;
  }

  get currentPhase(): RunPhase {
    return this.phase;
  }

  async run(state: GenerationState, { signal, listener }: RunOptions = {}): Promise<GenerationRunResult> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) forwardAbort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let haltError: Error | undefined;
    const context: RunContext = {
      state,
      signal: controller.signal,
      listener,
      checkpoint: pLimit(1),
      halt: error => {
        if (haltError) return;
        haltError = error;
        controller.abort(error);
      },
      haltError: () => haltError,
      counters: { appended: 0, succeeded: 0, failed: 0, softErrors: 0 },
    };

    const workers = pLimit(this.options.numWorkers);
    let stalledRounds = 0;

    logger.info(
      {
        runId: state.runId,
        provider: this.llmService.provider,
        model: this.llmService.model,
        existing: state.records.length,
        target: state.target,
        batchSize: this.options.batchSize,
        workers: this.options.numWorkers,
      },
      'Generation run starting'
    );

    try {
      while (state.records.length < state.target) {
        if (signal?.aborted) {
          return this.finish('cancelled', context);
        }

        const sizes = this.planRound(state.target - state.records.length);
        const outcomes = await Promise.all(
          sizes.map(size => workers(() => this.runBatch(++this.batchCounter, size, context)))
        );

        const halted = haltError;
        if (halted) {
          this.setPhase('failed', context);
          logger.error({ runId: state.runId, error: halted, records: state.records.length }, 'Generation halted');
          throw halted;
        }

        if (signal?.aborted) {
          return this.finish('cancelled', context);
        }

        const failure = outcomes.find(
          (outcome): outcome is Extract<BatchOutcome, { kind: 'failed' }> => outcome.kind === 'failed'
        );
        if (failure) {
          if (this.options.onBatchFailure === 'abort') {
            this.setPhase('failed', context);
            throw new BatchFailedError(
              `Batch failed after ${this.options.maxAttempts} attempts: ${failure.error.message}`,
              failure.error,
              { records: state.records.length, target: state.target }
            );
          }
          return this.finish('paused', context, failure.error);
        }

        const appendedThisRound = outcomes.reduce(
          (sum, outcome) => sum + (outcome.kind === 'merged' ? outcome.appended : 0),
          0
        );
        stalledRounds = appendedThisRound === 0 ? stalledRounds + 1 : 0;
        if (stalledRounds >= this.options.maxAttempts) {
          return this.finish(
            'paused',
            context,
            new GenerationError('MALFORMED', `No new records after ${stalledRounds} rounds; the model keeps repeating itself`)
          );
        }
      }

      return this.finish('completed', context);
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private planRound(remaining: number): number[] {
    const sizes: number[] = [];
    let left = remaining;
    for (let i = 0; i < this.options.numWorkers && left > 0; i++) {
      const size = Math.min(this.options.batchSize, left);
      sizes.push(size);
      left -= size;
    }
    return sizes;
  }

  private async runBatch(batchNumber: number, size: number, context: RunContext): Promise<BatchOutcome> {
    if (context.signal.aborted) {
      return { kind: 'discarded' };
    }

    this.setPhase('requesting', context);

    let parsed: ParsedBatch;
    try {
      parsed = await this.requestBatch(batchNumber, size, context);
    } catch (error) {
      if (context.signal.aborted && !(error instanceof GenerationError && error.kind === 'UNAUTHORIZED')) {
        return { kind: 'discarded' };
      }
      if (error instanceof GenerationError) {
        if (error.kind === 'UNAUTHORIZED') {
          context.halt(error);
          return { kind: 'discarded' };
        }
        context.counters.failed++;
        logger.error({ batchNumber, kind: error.kind, error }, 'Batch failed after retries');
        return { kind: 'failed', error };
      }
      context.halt(error instanceof Error ? error : new Error(String(error)));
      return { kind: 'discarded' };
    }

    try {
      return await context.checkpoint(() => this.mergeAndCheckpoint(batchNumber, size, parsed, context));
    } catch (error) {
      context.halt(error instanceof Error ? error : new Error(String(error)));
      return { kind: 'discarded' };
    }
  }

  private async requestBatch(batchNumber: number, size: number, context: RunContext): Promise<ParsedBatch> {
    const prompt = buildIncidentPrompt({
      fields: MODEL_FIELDS,
      count: size,
      taxonomy: this.options.taxonomy,
      closedOnly: this.options.closedOnly,
    });

    logger.debug({ batchNumber, system: prompt.system, user: prompt.user }, 'Generation prompt');

    return pRetry(
      async attempt => {
        logger.info({ batchNumber, attempt, size }, `Requesting ${size} incidents`);
        try {
          const raw = await raceAbort(this.llmService.generate(prompt, size), context.signal);
          logger.debug({ batchNumber, attempt, raw }, 'Raw model response');
          this.setPhase('validating', context);
          return this.parser.parse(raw);
        } catch (error) {
          if (context.signal.aborted) {
            throw new AbortError(error instanceof Error ? error : String(error));
          }
          const generationError =
            error instanceof GenerationError
              ? error
              : new GenerationError('UNREACHABLE', error instanceof Error ? error.message : String(error), error);
          if (!generationError.retryable) {
            throw new AbortError(generationError);
          }
          throw generationError;
        }
      },
      {
        retries: this.options.maxAttempts - 1,
        factor: 2,
        minTimeout: this.options.retryBaseDelayMs,
        maxTimeout: this.options.retryMaxDelayMs,
        randomize: false,
        signal: context.signal,
        onFailedAttempt: async error => {
          if (!(error instanceof GenerationError)) return;

          logger.warn(
            { batchNumber, attempt: error.attemptNumber, retriesLeft: error.retriesLeft, kind: error.kind },
            `Batch attempt failed: ${error.message}`
          );
          context.listener?.onRetry?.({
            batchNumber,
            attempt: error.attemptNumber,
            retriesLeft: error.retriesLeft,
            error,
          });

          if (error.kind === 'RATE_LIMITED' && error.retriesLeft > 0) {
            await this.sleep(this.options.rateLimitDelayMs, context.signal);
          }
        },
      }
    );
  }

  private async mergeAndCheckpoint(
    batchNumber: number,
    requested: number,
    parsed: ParsedBatch,
    context: RunContext
  ): Promise<BatchOutcome> {
    const { state, counters } = context;
    if (context.signal.aborted || context.haltError()) {
      return { kind: 'discarded' };
    }

    const seen = new Set(state.records.map(fingerprint));
    const duplicates: SoftError[] = [];
    const fresh = parsed.drafts.filter((draft, index) => {
      const key = fingerprint(draft);
      if (seen.has(key)) {
        duplicates.push({ index, reason: 'duplicate', issues: [`duplicate of an existing incident: ${key}`] });
        return false;
      }
      seen.add(key);
      return true;
    });

    const needed = state.target - state.records.length;
    if (fresh.length > needed) {
      logger.debug({ batchNumber, surplus: fresh.length - needed }, 'Dropping surplus records');
    }

    let sequence = maxSequence(state.records);
    const accepted: IncidentRecord[] = fresh.slice(0, needed).map(draft => ({
      Number: formatIncidentNumber(++sequence),
      ...draft,
    }));

    const softErrors = parsed.softErrors.length + duplicates.length;

    this.setPhase('checkpointing', context);
    const next: GenerationState = {
      ...state,
      records: [...state.records, ...accepted],
      softErrorCount: state.softErrorCount + softErrors,
      updatedAt: new Date().toISOString(),
    };
    await this.store.save(next);

    state.records = next.records;
    state.softErrorCount = next.softErrorCount;
    state.updatedAt = next.updatedAt;

    counters.appended += accepted.length;
    counters.succeeded++;
    counters.softErrors += softErrors;

    logger.info(
      { batchNumber, appended: accepted.length, softErrors, total: state.records.length, target: state.target },
      `Progress: ${state.records.length}/${state.target} incidents`
    );
    context.listener?.onBatchComplete?.({
      batchNumber,
      requested,
      appended: accepted.length,
      softErrors,
      total: state.records.length,
      target: state.target,
    });

    return { kind: 'merged', appended: accepted.length };
  }

  private setPhase(phase: RunPhase, context: RunContext): void {
    this.phase = phase;
    context.listener?.onPhase?.(phase, { count: context.state.records.length, target: context.state.target });
  }

  private finish(status: RunStatus, context: RunContext, error?: Error): GenerationRunResult {
    const { state, counters } = context;
    this.setPhase(status === 'completed' ? 'done' : status === 'paused' ? 'failed' : 'idle', context);

    const result: GenerationRunResult = {
      status,
      state,
      appended: counters.appended,
      batchesSucceeded: counters.succeeded,
      batchesFailed: counters.failed,
      softErrors: counters.softErrors,
      error,
    };

    const summary = { runId: state.runId, status, records: state.records.length, target: state.target, appended: counters.appended };
    if (status === 'completed') {
      logger.info(summary, 'Generation complete');
    } else {
      logger.warn({ ...summary, error }, `Generation ${status}; progress kept in ${this.store.location}`);
    }

    return result;
  }
}
