export const INCIDENT_STATES = ['New', 'In Progress', 'On Hold', 'Resolved', 'Closed', 'Canceled'] as const;
export const TERMINAL_STATES = ['Resolved', 'Closed', 'Canceled'] as const;
export const PRIORITIES = ['1 - Critical', '2 - High', '3 - Moderate', '4 - Low'] as const;
export const URGENCIES = ['1 - High', '2 - Medium', '3 - Low'] as const;
export const IMPACTS = ['1 - High', '2 - Medium', '3 - Low'] as const;

export type IncidentState = (typeof INCIDENT_STATES)[number];
export type IncidentPriority = (typeof PRIORITIES)[number];
export type IncidentUrgency = (typeof URGENCIES)[number];
export type IncidentImpact = (typeof IMPACTS)[number];

export interface IncidentRecord {
  Number: string;
  'Top-Category': string;
  'Sub-Category': string;
  Category: string;
  Effort: number;
  State: IncidentState;
  'Correlation ID': string;
  'Short Description': string;
  'Long Description': string;
  Created: string;
  Opened: string;
  Closed: string | null;
  Priority: IncidentPriority;
  Urgency: IncidentUrgency;
  Impact: IncidentImpact;
  'Assignment group': string;
  'Resolution code': string;
  'Resolution notes': string;
  'Resolve time': number;
  'Business duration': number;
  'Business resolve time': number;
}

/** A validated record before the orchestrator numbers it. */
export type IncidentDraft = Omit<IncidentRecord, 'Number'>;

export type IncidentColumn = keyof IncidentRecord;

export const COLUMN_NAMES: readonly IncidentColumn[] = [
  'Number',
  'Top-Category',
  'Sub-Category',
  'Category',
  'Effort',
  'State',
  'Correlation ID',
  'Short Description',
  'Long Description',
  'Created',
  'Opened',
  'Closed',
  'Priority',
  'Urgency',
  'Impact',
  'Assignment group',
  'Resolution code',
  'Resolution notes',
  'Resolve time',
  'Business duration',
  'Business resolve time',
];

export interface FieldSpec {
  column: IncidentColumn;
  type: 'String' | 'Number';
  description: string;
}

/** Field descriptions the prompt hands to the model. `Number` and the derived durations are ours. */
export const MODEL_FIELDS: readonly FieldSpec[] = [
  { column: 'Top-Category', type: 'String', description: 'e.g., "Hardware", "Software", "Network"' },
  { column: 'Sub-Category', type: 'String', description: 'e.g., "Desktop", "Laptop", "Server"' },
  { column: 'Category', type: 'String', description: 'more specific, e.g., "Monitor defect", "Printer offline"' },
  { column: 'Effort', type: 'Number', description: 'estimated hours, e.g., 2.5' },
  { column: 'State', type: 'String', description: `one of: ${INCIDENT_STATES.map(s => `"${s}"`).join(', ')}` },
  { column: 'Correlation ID', type: 'String', description: 'e.g., "CORR-2024-001234"' },
  { column: 'Short Description', type: 'String', description: 'max 100 characters' },
  { column: 'Long Description', type: 'String', description: 'detailed description of the problem' },
  { column: 'Created', type: 'String', description: 'format "YYYY-MM-DD HH:MM:SS"' },
  { column: 'Opened', type: 'String', description: 'format "YYYY-MM-DD HH:MM:SS", not before Created' },
  {
    column: 'Closed',
    type: 'String',
    description: 'format "YYYY-MM-DD HH:MM:SS", not before Opened; null unless State is Resolved, Closed or Canceled',
  },
  { column: 'Priority', type: 'String', description: `one of: ${PRIORITIES.map(p => `"${p}"`).join(', ')}` },
  { column: 'Urgency', type: 'String', description: `one of: ${URGENCIES.map(u => `"${u}"`).join(', ')}` },
  { column: 'Impact', type: 'String', description: `one of: ${IMPACTS.map(i => `"${i}"`).join(', ')}` },
  {
    column: 'Assignment group',
    type: 'String',
    description: 'e.g., "IT Support Level 1", "Network Team", "Application Support"',
  },
  {
    column: 'Resolution code',
    type: 'String',
    description: 'required for closed incidents, e.g., "Solved (Work Around)", "Solved (Permanently)", "Solved (Known Error)"',
  },
  {
    column: 'Resolution notes',
    type: 'String',
    description: 'required for closed incidents, detailed explanation of how the incident was resolved',
  },
];

const TERMINAL: ReadonlySet<string> = new Set(TERMINAL_STATES);

export const isTerminalState = (state: string): boolean => TERMINAL.has(state);

export const INCIDENT_NUMBER_PREFIX = 'INC';
const INCIDENT_NUMBER_WIDTH = 6;

export const formatIncidentNumber = (sequence: number): string =>
  `${INCIDENT_NUMBER_PREFIX}${String(sequence).padStart(INCIDENT_NUMBER_WIDTH, '0')}`;

/** Returns the numeric part of `INC000042`, or `null` for anything else. */
export const parseIncidentNumber = (value: string): number | null => {
  const match = /^INC(\d+)$/.exec(value);
  return match ? Number.parseInt(match[1], 10) : null;
};
