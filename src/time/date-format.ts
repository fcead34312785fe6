import { zonedFields } from './zone.js';

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** Local calendar date (YYYY-MM-DD) of an epoch-seconds timestamp in `timeZone`. */
export function formatLocalDate(timestamp: number, timeZone: string): string {
  const { year, month, day } = zonedFields(timestamp * 1000, timeZone);
  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;
}

/** ISO 8601 UTC rendering of an epoch-seconds timestamp. */
export function formatUtcTimestamp(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString().replace('.000Z', 'Z');
}
