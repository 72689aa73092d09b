import { describe, it, expect } from 'vitest';
import {
  businessMinutesBetween,
  calendarMinutesBetween,
  deriveDurations,
  withDerivedDurations,
  type BusinessHours,
} from '../durations.js';

describe('durations', () => {
  describe('calendarMinutesBetween', () => {
    it('should floor to whole minutes', () => {
      expect(calendarMinutesBetween('2024-03-04 09:00:00', '2024-03-04 10:30:45')).toBe(90);
    });

    it('should return 0 when the end precedes the start', () => {
      expect(calendarMinutesBetween('2024-03-04 10:00:00', '2024-03-04 09:00:00')).toBe(0);
    });

    it('should count across days', () => {
      expect(calendarMinutesBetween('2024-03-04 23:00:00', '2024-03-05 01:00:00')).toBe(120);
    });
  });

  describe('businessMinutesBetween', () => {
    it('should count only the part inside the working window', () => {
      // Monday, opens at 08:00
      expect(businessMinutesBetween('2024-03-04 07:00:00', '2024-03-04 10:00:00')).toBe(120);
    });

    it('should skip the night between two working days', () => {
      expect(businessMinutesBetween('2024-03-04 16:30:00', '2024-03-05 08:30:00')).toBe(60);
    });

    it('should skip weekends', () => {
      // Friday 16:00 → Monday 09:00
      expect(businessMinutesBetween('2024-03-08 16:00:00', '2024-03-11 09:00:00')).toBe(120);
    });

    it('should return 0 for a span entirely on a weekend', () => {
      expect(businessMinutesBetween('2024-03-09 10:00:00', '2024-03-10 15:00:00')).toBe(0);
    });

    it('should count working days before 1970', () => {
      // Wednesday 1969-12-31 and Thursday 1970-01-01
      expect(businessMinutesBetween('1969-12-31 09:00:00', '1969-12-31 10:00:00')).toBe(60);
      expect(businessMinutesBetween('1969-12-31 16:00:00', '1970-01-01 09:00:00')).toBe(120);
    });

    it('should honour custom business hours', () => {
      const always: BusinessHours = { startHour: 0, endHour: 24, days: [0, 1, 2, 3, 4, 5, 6] };
      expect(businessMinutesBetween('2024-03-09 10:00:00', '2024-03-10 10:00:00', always)).toBe(1440);
    });
  });

  describe('deriveDurations', () => {
    it('should derive all three metrics from the timestamps', () => {
      expect(
        deriveDurations({ Created: '2024-03-04 09:00:00', Opened: '2024-03-04 09:30:00', Closed: '2024-03-04 11:00:00' })
      ).toEqual({ 'Resolve time': 90, 'Business duration': 120, 'Business resolve time': 90 });
    });

    it('should return zeros for an open incident', () => {
      expect(deriveDurations({ Created: '2024-03-04 09:00:00', Opened: '2024-03-04 09:30:00', Closed: null })).toEqual({
        'Resolve time': 0,
        'Business duration': 0,
        'Business resolve time': 0,
      });
    });

    it('should be idempotent when reapplied', () => {
      const once = withDerivedDurations({
        Created: '2024-03-08 15:00:00',
        Opened: '2024-03-08 16:00:00',
        Closed: '2024-03-11 09:00:00',
        'Resolve time': 5,
        'Business duration': 5,
        'Business resolve time': 5,
      });
      const twice = withDerivedDurations(once);

      expect(once['Resolve time']).toBe(3900);
      expect(once['Business duration']).toBe(180);
      expect(once['Business resolve time']).toBe(120);
      expect(twice).toEqual(once);
    });
  });
});
