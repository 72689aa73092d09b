import { describe, it, expect } from 'vitest';
import {
  COLUMN_NAMES,
  MODEL_FIELDS,
  formatIncidentNumber,
  isTerminalState,
  parseIncidentNumber,
} from '../entities/IncidentRecord.js';

describe('IncidentRecord', () => {
  it('should keep 21 columns in export order', () => {
    expect(COLUMN_NAMES).toHaveLength(21);
    expect(COLUMN_NAMES[0]).toBe('Number');
    expect(COLUMN_NAMES.slice(-3)).toEqual(['Resolve time', 'Business duration', 'Business resolve time']);
  });

  it('should not ask the model for computed columns', () => {
    const asked = MODEL_FIELDS.map(field => field.column);
    expect(asked).not.toContain('Number');
    expect(asked).not.toContain('Resolve time');
    expect(asked).toHaveLength(17);
  });

  it('should format and parse incident numbers', () => {
    expect(formatIncidentNumber(42)).toBe('INC000042');
    expect(formatIncidentNumber(1234567)).toBe('INC1234567');
    expect(parseIncidentNumber('INC000042')).toBe(42);
    expect(parseIncidentNumber('INC-42')).toBeNull();
  });

  it('should know which states are terminal', () => {
    expect(isTerminalState('Closed')).toBe(true);
    expect(isTerminalState('Canceled')).toBe(true);
    expect(isTerminalState('On Hold')).toBe(false);
  });
});
