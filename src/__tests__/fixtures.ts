import { formatIncidentNumber, type IncidentDraft, type IncidentRecord } from '../domain/entities/IncidentRecord.js';
import { RecordValidator } from '../services/generation/RecordValidator.js';
import { createGenerationState } from '../services/generation/state.js';
import type { GenerationState } from '../types/generation.types.js';

/** A closed incident as a model would send it: Monday 2024-03-04, 09:00 → 11:00. */
export const rawIncident = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  'Top-Category': 'Hardware',
  'Sub-Category': 'Desktop',
  Category: 'Monitor defect',
  Effort: 2.5,
  State: 'Closed',
  'Correlation ID': 'CORR-2024-000001',
  'Short Description': 'Monitor flickers on login',
  'Long Description': 'The external monitor flickers every few seconds after the user logs in.',
  Created: '2024-03-04 09:00:00',
  Opened: '2024-03-04 09:30:00',
  Closed: '2024-03-04 11:00:00',
  Priority: '3 - Moderate',
  Urgency: '2 - Medium',
  Impact: '3 - Low',
  'Assignment group': 'IT Support Level 1',
  'Resolution code': 'Solved (Permanently)',
  'Resolution notes': 'Replaced the DisplayPort cable.',
  ...overrides,
});

export const incidentDraft = (overrides: Record<string, unknown> = {}): IncidentDraft => {
  const result = new RecordValidator().validate(rawIncident(overrides), 0);
  if (!result.ok) {
    throw new Error(`fixture is invalid: ${result.error.issues.join('; ')}`);
  }
  return result.draft;
};

export const incidentRecord = (sequence: number, overrides: Record<string, unknown> = {}): IncidentRecord => ({
  Number: formatIncidentNumber(sequence),
  ...incidentDraft(overrides),
});

/** `count` distinct raw incidents, distinguished by their short description. */
export const rawBatch = (count: number, offset = 0): Record<string, unknown>[] =>
  Array.from({ length: count }, (_, i) => rawIncident({ 'Short Description': `Incident ${offset + i + 1}` }));

export const stateWith = (target: number, records: IncidentRecord[] = []): GenerationState => ({
  ...createGenerationState(target, new Date('2024-03-04T12:00:00Z')),
  records,
});
