import { describe, it, expect } from 'vitest';
import { formatTimestamp, normalizeTimestamp, timestampToMillis } from '../timestamps.js';

describe('timestamps', () => {
  it('should normalize the accepted spellings to one format', () => {
    expect(normalizeTimestamp('2024-03-04 09:15:00')).toBe('2024-03-04 09:15:00');
    expect(normalizeTimestamp('2024-03-04T09:15:00')).toBe('2024-03-04 09:15:00');
    expect(normalizeTimestamp('2024-03-04T09:15:00.250Z')).toBe('2024-03-04 09:15:00');
    expect(normalizeTimestamp('2024-03-04 09:15')).toBe('2024-03-04 09:15:00');
    expect(normalizeTimestamp('  2024-03-04 09:15:30  ')).toBe('2024-03-04 09:15:30');
  });

  it('should reject impossible calendar dates', () => {
    expect(normalizeTimestamp('2024-02-30 10:00:00')).toBeNull();
    expect(normalizeTimestamp('2023-02-29 10:00:00')).toBeNull();
    expect(normalizeTimestamp('2024-03-04 24:00:00')).toBeNull();
  });

  it('should reject other formats', () => {
    expect(normalizeTimestamp('04.03.2024 09:15')).toBeNull();
    expect(normalizeTimestamp('2024-03-04')).toBeNull();
    expect(normalizeTimestamp('yesterday')).toBeNull();
  });

  it('should read timestamps as UTC wall-clock time', () => {
    expect(timestampToMillis('2024-03-04 09:15:00')).toBe(Date.UTC(2024, 2, 4, 9, 15, 0));
    expect(formatTimestamp(Date.UTC(2024, 2, 4, 9, 15, 0))).toBe('2024-03-04 09:15:00');
  });

  it('should throw on an invalid timestamp', () => {
    expect(() => timestampToMillis('not a date')).toThrow(RangeError);
  });
});
