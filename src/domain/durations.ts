import { timestampToMillis } from './timestamps.js';
import type { IncidentRecord } from './entities/IncidentRecord.js';

export interface BusinessHours {
  startHour: number;
  endHour: number;
  /** 0 = Sunday … 6 = Saturday */
  days: number[];
}

export const DEFAULT_BUSINESS_HOURS: BusinessHours = {
  startHour: 8,
  endHour: 17,
  days: [1, 2, 3, 4, 5],
};

export interface DerivedDurations {
  'Resolve time': number;
  'Business duration': number;
  'Business resolve time': number;
}

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export function calendarMinutesBetween(start: string, end: string): number {
  const diff = timestampToMillis(end) - timestampToMillis(start);
  return diff > 0 ? Math.floor(diff / MINUTE_MS) : 0;
}

export function businessMinutesBetween(start: string, end: string, hours: BusinessHours = DEFAULT_BUSINESS_HOURS): number {
  const startMs = timestampToMillis(start);
  const endMs = timestampToMillis(end);
  if (endMs <= startMs) return 0;

  const workingDays = new Set(hours.days);
  let total = 0;

  // floor, not truncation: times before 1970 are negative
  const firstDay = startMs - (((startMs % DAY_MS) + DAY_MS) % DAY_MS);
  for (let dayStart = firstDay; dayStart < endMs; dayStart += DAY_MS) {
    if (!workingDays.has(new Date(dayStart).getUTCDay())) continue;

    const windowStart = Math.max(startMs, dayStart + hours.startHour * HOUR_MS);
    const windowEnd = Math.min(endMs, dayStart + hours.endHour * HOUR_MS);
    if (windowEnd > windowStart) {
      total += windowEnd - windowStart;
    }
  }

  return Math.floor(total / MINUTE_MS);
}

type TimestampTriple = Pick<IncidentRecord, 'Created' | 'Opened' | 'Closed'>;

/** Open incidents (no `Closed`) have nothing to measure yet and get zeros. */
export function deriveDurations(record: TimestampTriple, hours: BusinessHours = DEFAULT_BUSINESS_HOURS): DerivedDurations {
  if (record.Closed === null) {
    return { 'Resolve time': 0, 'Business duration': 0, 'Business resolve time': 0 };
  }

  return {
    'Resolve time': calendarMinutesBetween(record.Opened, record.Closed),
    'Business duration': businessMinutesBetween(record.Created, record.Closed, hours),
    'Business resolve time': businessMinutesBetween(record.Opened, record.Closed, hours),
  };
}

export function withDerivedDurations<T extends TimestampTriple>(record: T, hours: BusinessHours = DEFAULT_BUSINESS_HOURS): T & DerivedDurations {
  return { ...record, ...deriveDurations(record, hours) };
}
