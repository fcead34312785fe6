import { DiaryError } from '../errors.js';
import type { StoredEntry } from '../model/entry.js';
import type { DiaryDatabase } from '../storage/database.js';
import { formatLocalDate } from '../time/date-format.js';

export interface NewEntryOptions {
  timeZone: string;
  /** Epoch milliseconds; defaults to Date.now */
  now?: () => number;
}

/** Append an entry written now, dated by the local day in `timeZone`. */
export function addEntry(db: DiaryDatabase, body: string, opts: NewEntryOptions): StoredEntry {
  if (body.trim() === '') {
    throw new DiaryError('Entry body is empty', 'EMPTY_ENTRY');
  }
  if (!db.hasSchema()) {
    throw new DiaryError('Diary tables are missing. Run `diary init` first.', 'SCHEMA_MISSING');
  }

  const timestamp = Math.floor((opts.now ?? Date.now)() / 1000);
  const date = formatLocalDate(timestamp, opts.timeZone);
  const id = db.transaction(() => db.insertEntry({ timestamp, date, body }));
  return { id, timestamp, date, body };
}
