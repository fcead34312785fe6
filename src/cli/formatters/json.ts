import type { MonthGroup, SearchHit, StoredEntry, YearCount } from '../../model/entry.js';
import { formatUtcTimestamp } from '../../time/date-format.js';
import { bodyHash } from '../../utils/hash.js';

function entryJson(e: StoredEntry) {
  return {
    id: e.id,
    timestamp: e.timestamp,
    utc: formatUtcTimestamp(e.timestamp),
    date: e.date,
    body: e.body,
  };
}

export function formatEntryListJson(entries: StoredEntry[]): string {
  return JSON.stringify({ count: entries.length, entries: entries.map(entryJson) }, null, 2);
}

export function formatYearCountsJson(counts: YearCount[]): string {
  return JSON.stringify({
    total: counts.reduce((sum, c) => sum + c.count, 0),
    years: counts,
  }, null, 2);
}

export function formatYearJson(year: number, months: MonthGroup[]): string {
  return JSON.stringify({
    year,
    count: months.reduce((sum, m) => sum + m.entries.length, 0),
    months: months.map(m => ({ month: m.month, name: m.name, entries: m.entries.map(entryJson) })),
  }, null, 2);
}

export function formatSearchHitsJson(query: string, hits: SearchHit[]): string {
  return JSON.stringify({ query, count: hits.length, results: hits }, null, 2);
}

export function formatEntryJson(entry: StoredEntry): string {
  return JSON.stringify({ ...entryJson(entry), sha256: bodyHash(entry.body) }, null, 2);
}
