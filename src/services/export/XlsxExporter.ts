import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { dirname, extname } from 'path';
import * as XLSX from 'xlsx';
import { logger } from '../../utils/logger.js';
import { ExportError } from '../../utils/errors.js';
import { COLUMN_NAMES, type IncidentRecord } from '../../domain/entities/IncidentRecord.js';
import { DEFAULT_BUSINESS_HOURS, withDerivedDurations, type BusinessHours } from '../../domain/durations.js';
import type { ExportFormat, ExportSummary, RecordExporter } from './RecordExporter.interface.js';

export const SHEET_NAME = 'Incidents';

type Cell = string | number | null;

export const formatFor = (destination: string): ExportFormat =>
  extname(destination).toLowerCase() === '.csv' ? 'csv' : 'xlsx';

export class XlsxExporter implements RecordExporter {
  constructor(private businessHours: BusinessHours = DEFAULT_BUSINESS_HOURS) {}

  /** Header plus one row per record; durations are recomputed, never trusted. */
  toRows(records: readonly IncidentRecord[]): Cell[][] {
    const rows: Cell[][] = [[...COLUMN_NAMES]];
    for (const record of records) {
      const complete = withDerivedDurations(record, this.businessHours);
      rows.push(COLUMN_NAMES.map(column => complete[column]));
    }
    return rows;
  }

  async export(records: readonly IncidentRecord[], destination: string): Promise<ExportSummary> {
    const format = formatFor(destination);
    const rows = this.toRows(records);

    const sheet = XLSX.utils.aoa_to_sheet(rows);
    const tempPath = `${destination}.tmp`;

    try {
      const content: Buffer | string =
        format === 'csv' ? XLSX.utils.sheet_to_csv(sheet) : this.toWorkbookBuffer(sheet);

      await mkdir(dirname(destination), { recursive: true });
      await writeFile(tempPath, content);
      await rename(tempPath, destination);
    } catch (error) {
      await rm(tempPath, { force: true }).catch(cleanupError =>
        logger.warn({ tempPath, error: cleanupError }, 'Could not remove temporary export file')
      );
      logger.error({ destination, error }, 'Export failed');
      throw new ExportError(
        `Failed to export incidents to ${destination}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    const summary: ExportSummary = {
      path: destination,
      rows: records.length,
      columns: COLUMN_NAMES.length,
      format,
    };
    logger.info(summary, `Exported ${records.length} incidents`);
    return summary;
  }

  private toWorkbookBuffer(sheet: XLSX.WorkSheet): Buffer {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAME);
    const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(output)) {
      throw new ExportError('Spreadsheet writer did not return a buffer');
    }
    return output;
  }
}
