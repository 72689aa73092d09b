import { v4 as uuidv4 } from 'uuid';

/** Run ids look like `run-20240312-1f3a9c2e`; the date part keeps cache files sortable by eye. */
export function generateRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 10).replace(/-/g, '');
  return `run-${stamp}-${uuidv4().slice(0, 8)}`;
}
