import { parseIncidentNumber } from '../../domain/entities/IncidentRecord.js';
import type { IncidentDraft, IncidentRecord } from '../../domain/entities/IncidentRecord.js';
import { GENERATION_STATE_VERSION, type GenerationState } from '../../types/generation.types.js';
import { generateRunId } from '../../utils/uuid.js';

export function createGenerationState(target: number, now: Date = new Date()): GenerationState {
  const timestamp = now.toISOString();
  return {
    version: GENERATION_STATE_VERSION,
    runId: generateRunId(now),
    target,
    records: [],
    softErrorCount: 0,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/** Highest sequence already handed out; numbering continues after it. */
export function maxSequence(records: readonly IncidentRecord[]): number {
  let max = 0;
  for (const record of records) {
    const sequence = parseIncidentNumber(record.Number);
    if (sequence !== null && sequence > max) max = sequence;
  }
  return max;
}

export function fingerprint(record: Pick<IncidentDraft, 'Short Description' | 'Created'>): string {
  return `${record['Short Description'].toLowerCase().replace(/\s+/g, ' ').trim()}|${record.Created}`;
}
