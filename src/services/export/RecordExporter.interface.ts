import type { IncidentRecord } from '../../domain/entities/IncidentRecord.js';

export type ExportFormat = 'xlsx' | 'csv';

export interface ExportSummary {
  path: string;
  rows: number;
  columns: number;
  format: ExportFormat;
}

export interface RecordExporter {
  export(records: readonly IncidentRecord[], destination: string): Promise<ExportSummary>;
}
