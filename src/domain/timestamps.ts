const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?Z?$/;

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Incident timestamps are wall-clock values without a zone. They are held as
 * `YYYY-MM-DD HH:MM:SS` strings and converted to UTC epoch millis only for
 * arithmetic, so no local time zone ever leaks into the numbers.
 */
export function normalizeTimestamp(value: string): string | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour, minute, second = '00'] = match;
  const millis = Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second));
  const date = new Date(millis);

  // rejects 2024-02-30 and friends, which Date.UTC silently rolls over
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day) ||
    date.getUTCHours() !== Number(hour) ||
    date.getUTCMinutes() !== Number(minute) ||
    date.getUTCSeconds() !== Number(second)
  ) {
    return null;
  }

  return formatTimestamp(millis);
}

export function timestampToMillis(value: string): number {
  const normalized = normalizeTimestamp(value);
  if (normalized === null) {
    throw new RangeError(`Invalid timestamp: ${value}`);
  }
  const [datePart, timePart] = normalized.split(' ');
  const [year, month, day] = datePart.split('-').map(Number);
  const [hour, minute, second] = timePart.split(':').map(Number);
  return Date.UTC(year, month - 1, day, hour, minute, second);
}

export function formatTimestamp(millis: number): string {
  const date = new Date(millis);
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}
