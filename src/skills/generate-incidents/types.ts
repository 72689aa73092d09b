import type { RunStatus } from '../../types/generation.types.js';
import type { ExportSummary } from '../../services/export/RecordExporter.interface.js';

export type OutputFormat = 'table' | 'json';

export interface GenerateOptions {
  /** Target total; may be omitted when resuming a cache that already has one. */
  count?: number;
  fresh: boolean;
  exportOnly: boolean;
  clearCache: boolean;
}

export type GenerateStatus = RunStatus | 'exported';

export interface GenerateSummary {
  status: GenerateStatus;
  runId?: string;
  provider?: string;
  model?: string;
  records: number;
  target: number;
  appended: number;
  softErrors: number;
  batchesSucceeded: number;
  batchesFailed: number;
  cacheFile: string;
  cacheCleared: boolean;
  export?: ExportSummary;
  error?: string;
}
