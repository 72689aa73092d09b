import { logger } from '../../utils/logger.js';
import { ConfigurationError } from '../../utils/errors.js';
import type { AppConfig } from '../../config/index.js';
import { LLMServiceFactory } from '../../services/llm/LLMServiceFactory.js';
import type { LLMService } from '../../services/llm/LLMService.interface.js';
import { FileSystemGenerationStore } from '../../services/storage/FileSystemGenerationStore.js';
import type { GenerationStore } from '../../services/storage/GenerationStore.interface.js';
import { XlsxExporter } from '../../services/export/XlsxExporter.js';
import type { RecordExporter } from '../../services/export/RecordExporter.interface.js';
import { GenerationOrchestrator } from '../../services/generation/GenerationOrchestrator.js';
import { createGenerationState } from '../../services/generation/state.js';
import type { GenerationListener, GenerationRunResult, GenerationState } from '../../types/generation.types.js';
import type { GenerateOptions, GenerateSummary } from './types.js';

export interface IncidentGeneratorDeps {
  llmService?: LLMService;
  store?: GenerationStore;
  exporter?: RecordExporter;
}

export class IncidentGenerator {
  private store: GenerationStore;
  private exporter: RecordExporter;
  private llmService?: LLMService;

  constructor(private config: AppConfig, deps: IncidentGeneratorDeps = {}) {
    this.store = deps.store ?? new FileSystemGenerationStore(config.output.cacheFile);
    this.exporter = deps.exporter ?? new XlsxExporter(config.businessHours);
    this.llmService = deps.llmService;
  }

  async run(options: GenerateOptions, listener?: GenerationListener, signal?: AbortSignal): Promise<GenerateSummary> {
    if (options.fresh) {
      logger.info({ cacheFile: this.store.location }, 'Discarding existing cache');
      await this.store.clear();
    }

    const stored = options.fresh ? null : await this.store.load();

    if (options.exportOnly) {
      const records = stored?.records ?? [];
      const exported = await this.exporter.export(records, this.config.output.outputFile);
      return {
        ...this.emptySummary('exported', stored),
        export: exported,
      };
    }

    const state = this.resolveState(stored, options.count);

    let result: GenerationRunResult;
    if (state.records.length >= state.target) {
      logger.info(
        { records: state.records.length, target: state.target },
        'Cache already holds the requested number of incidents; skipping generation'
      );
      result = {
        status: 'completed',
        state,
        appended: 0,
        batchesSucceeded: 0,
        batchesFailed: 0,
        softErrors: 0,
      };
    } else {
      const llmService = this.getLLMService();
      const orchestrator = new GenerationOrchestrator(llmService, this.store, {
        ...this.config.generation,
        taxonomy: this.config.categories,
        businessHours: this.config.businessHours,
      });
      result = await orchestrator.run(state, { signal, listener });
    }

    const summary: GenerateSummary = {
      status: result.status,
      runId: state.runId,
      provider: this.llmService?.provider,
      model: this.llmService?.model,
      records: state.records.length,
      target: state.target,
      appended: result.appended,
      softErrors: result.softErrors,
      batchesSucceeded: result.batchesSucceeded,
      batchesFailed: result.batchesFailed,
      cacheFile: this.store.location,
      cacheCleared: false,
      error: result.error?.message,
    };

    if (result.status !== 'completed') {
      return summary;
    }

    // over-target caches (a lowered --count) export only what was asked for
    summary.export = await this.exporter.export(state.records.slice(0, state.target), this.config.output.outputFile);

    if (options.clearCache || this.config.output.clearCacheOnSuccess) {
      await this.store.clear();
      summary.cacheCleared = true;
      logger.info({ cacheFile: this.store.location }, 'Cache cleared');
    }

    return summary;
  }

  private resolveState(stored: GenerationState | null, count: number | undefined): GenerationState {
    if (!stored) {
      if (count === undefined) {
        throw new ConfigurationError('--count is required when there is no cache to resume');
      }
      return createGenerationState(count);
    }

    if (count !== undefined && count !== stored.target) {
      logger.info({ from: stored.target, to: count }, 'Changing target of resumed run');
      stored.target = count;
    }

    logger.info(
      { runId: stored.runId, records: stored.records.length, target: stored.target },
      `Resuming from ${this.store.location}`
    );
    return stored;
  }

  private getLLMService(): LLMService {
    if (!this.llmService) {
      this.llmService = LLMServiceFactory.createLLMService(this.config.llm);
    }
    return this.llmService;
  }

  private emptySummary(status: GenerateSummary['status'], stored: GenerationState | null): GenerateSummary {
    return {
      status,
      runId: stored?.runId,
      records: stored?.records.length ?? 0,
      target: stored?.target ?? 0,
      appended: 0,
      softErrors: 0,
      batchesSucceeded: 0,
      batchesFailed: 0,
      cacheFile: this.store.location,
      cacheCleared: false,
    };
  }
}
