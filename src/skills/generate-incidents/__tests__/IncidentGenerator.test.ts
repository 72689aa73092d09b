import { describe, it, expect } from 'vitest';
import { IncidentGenerator } from '../index.js';
import { parseConfig, toRawConfig } from '../../../config/index.js';
import { ConfigurationError, GenerationError } from '../../../utils/errors.js';
import type { IncidentRecord } from '../../../domain/entities/IncidentRecord.js';
import type { ExportSummary, RecordExporter } from '../../../services/export/RecordExporter.interface.js';
import { InMemoryStore, ScriptedLLMService, freshIncidents } from '../../../__tests__/fakes.js';
import { incidentRecord, stateWith } from '../../../__tests__/fixtures.js';

class RecordingExporter implements RecordExporter {
  readonly exports: Array<{ records: IncidentRecord[]; destination: string }> = [];

  async export(records: readonly IncidentRecord[], destination: string): Promise<ExportSummary> {
    this.exports.push({ records: [...records], destination });
    return { path: destination, rows: records.length, columns: 21, format: 'xlsx' };
  }
}

const config = (output: Record<string, unknown> = {}) =>
  parseConfig(
    toRawConfig(
      {
        llm_provider: 'local',
        local: { model: 'test-model' },
        generation: { retry_base_delay_ms: 0, retry_max_delay_ms: 0, max_attempts: 2 },
        output: { output_file: 'out/incidents.xlsx', ...output },
      },
      {}
    )
  );

const defaults = { fresh: false, exportOnly: false, clearCache: false };

const setup = (llm = new ScriptedLLMService([], freshIncidents()), output: Record<string, unknown> = {}) => {
  const store = new InMemoryStore();
  const exporter = new RecordingExporter();
  const generator = new IncidentGenerator(config(output), { llmService: llm, store, exporter });
  return { llm, store, exporter, generator };
};

describe('IncidentGenerator', () => {
  it('should generate the requested count and export it', async () => {
    const { llm, exporter, generator } = setup();

    const summary = await generator.run({ ...defaults, count: 7 });

    expect(summary.status).toBe('completed');
    expect(summary.records).toBe(7);
    expect(summary.appended).toBe(7);
    expect(summary.provider).toBe('local');
    expect(llm.requested).toEqual([5, 2]);
    expect(exporter.exports).toHaveLength(1);
    expect(exporter.exports[0].destination).toBe('out/incidents.xlsx');
    expect(exporter.exports[0].records).toHaveLength(7);
    expect(summary.export).toEqual({ path: 'out/incidents.xlsx', rows: 7, columns: 21, format: 'xlsx' });
    expect(summary.cacheCleared).toBe(false);
  });

  it('should require a count when there is nothing to resume', async () => {
    const { generator } = setup();

    await expect(generator.run(defaults)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should resume a stored run toward its stored target', async () => {
    const { llm, store, generator } = setup();
    await store.save(stateWith(4, [incidentRecord(1, { 'Short Description': 'Kept A' }), incidentRecord(2, { 'Short Description': 'Kept B' })]));

    const summary = await generator.run(defaults);

    expect(summary.status).toBe('completed');
    expect(summary.appended).toBe(2);
    expect(llm.requested).toEqual([2]);
    expect((await store.load())?.records.map(record => record.Number)).toEqual(['INC000001', 'INC000002', 'INC000003', 'INC000004']);
  });

  it('should skip generation when the cache already reaches the target', async () => {
    const { llm, store, exporter, generator } = setup();
    await store.save(stateWith(4, [1, 2, 3, 4].map(seq => incidentRecord(seq, { 'Short Description': `Kept ${seq}` }))));

    const summary = await generator.run({ ...defaults, count: 2 });

    expect(summary.status).toBe('completed');
    expect(llm.requested).toEqual([]);
    expect(exporter.exports[0].records.map(record => record.Number)).toEqual(['INC000001', 'INC000002']);
  });

  it('should start over with fresh', async () => {
    const { store, generator } = setup();
    await store.save(stateWith(4, [incidentRecord(9, { 'Short Description': 'Old' })]));

    await generator.run({ ...defaults, fresh: true, count: 1 });

    expect((await store.load())?.records.map(record => record.Number)).toEqual(['INC000001']);
  });

  it('should export what is cached without generating', async () => {
    const { llm, store, exporter, generator } = setup();
    await store.save(stateWith(10, [incidentRecord(1)]));

    const summary = await generator.run({ ...defaults, exportOnly: true });

    expect(summary.status).toBe('exported');
    expect(summary.records).toBe(1);
    expect(llm.requested).toEqual([]);
    expect(exporter.exports[0].records).toHaveLength(1);
  });

  it('should export a header-only file when there is no cache', async () => {
    const { exporter, generator } = setup();

    await generator.run({ ...defaults, exportOnly: true });

    expect(exporter.exports).toEqual([{ records: [], destination: 'out/incidents.xlsx' }]);
  });

  it('should clear the cache after a successful export when asked', async () => {
    const { store, generator } = setup(undefined, { clear_cache_on_success: true });

    const summary = await generator.run({ ...defaults, count: 1 });

    expect(summary.cacheCleared).toBe(true);
    await expect(store.load()).resolves.toBeNull();
  });

  it('should keep the cache and skip the export when paused', async () => {
    const failing = new ScriptedLLMService([], () => {
      throw new GenerationError('UNREACHABLE', 'connection refused');
    });
    const { exporter, generator } = setup(failing);

    const summary = await generator.run({ ...defaults, count: 3 });

    expect(summary.status).toBe('paused');
    expect(summary.error).toBe('connection refused');
    expect(summary.batchesFailed).toBe(1);
    expect(exporter.exports).toEqual([]);
  });
});
