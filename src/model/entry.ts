export interface Entry {
  /** Unix epoch seconds */
  timestamp: number;
  /** Local calendar date, YYYY-MM-DD */
  date: string;
  body: string;
}

export interface StoredEntry extends Entry {
  /** SQLite rowid of the entries row */
  id: number;
}

export interface SearchHit {
  id: number;
  timestamp: number;
  date: string;
  snippet: string;
}

export interface YearCount {
  year: number;
  count: number;
}

/** Wall-clock fields in some time zone. Month is 1-based. */
export interface LocalDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second?: number;
}

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

export interface MonthGroup {
  /** 1-based */
  month: number;
  name: string;
  entries: StoredEntry[];
}

/** Group entries by the month of their local date, months ascending, entries by timestamp. */
export function groupByMonth(entries: StoredEntry[]): MonthGroup[] {
  const byMonth = new Map<number, StoredEntry[]>();
  for (const entry of entries) {
    const month = Number(entry.date.slice(5, 7));
    const list = byMonth.get(month) ?? [];
    list.push(entry);
    byMonth.set(month, list);
  }

  return [...byMonth]
    .sort(([a], [b]) => a - b)
    .map(([month, list]) => ({
      month,
      name: MONTH_NAMES[month - 1] ?? String(month),
      entries: [...list].sort((a, b) => a.timestamp - b.timestamp || a.id - b.id),
    }));
}
