import Database from 'better-sqlite3';
import type { Entry, SearchHit, StoredEntry, YearCount } from '../model/entry.js';
import { ENTRY_TABLES, SCHEMA_DDL } from './schema.js';

export class DiaryDatabase {
  private db: Database.Database;

  constructor(dbPath: string, opts: { readonly?: boolean; fileMustExist?: boolean } = {}) {
    this.db = new Database(dbPath, opts);
    if (!opts.readonly) {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }
  }

  /** Create the entries table and its full-text mirror. Safe to run repeatedly. */
  migrate(): void {
    this.db.exec(SCHEMA_DDL);
  }

  hasSchema(): boolean {
    const stmt = this.db.prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE name = ? AND type IN ('table', 'view')"
    );
    return ENTRY_TABLES.every(table => stmt.get(table) !== undefined);
  }

  /** Append one entry and its search row. Returns the entry's rowid. */
  insertEntry(entry: Entry): number {
    const result = this.db.prepare(
      'INSERT INTO entries (timestamp, date, body) VALUES (?, ?, ?)'
    ).run(entry.timestamp, entry.date, entry.body);
    this.db.prepare('INSERT INTO entrytext (body) VALUES (?)').run(entry.body);
    return Number(result.lastInsertRowid);
  }

  /** Run `fn` in a single transaction; any throw rolls everything back. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  countEntries(): number {
    const row = this.db.prepare<[], { cnt: number }>('SELECT count(*) AS cnt FROM entries').get();
    return row?.cnt ?? 0;
  }

  countEntryText(): number {
    const row = this.db.prepare<[], { cnt: number }>('SELECT count(*) AS cnt FROM entrytext').get();
    return row?.cnt ?? 0;
  }

  getEntry(id: number): StoredEntry | undefined {
    return this.db.prepare<[number], StoredEntry>(
      'SELECT rowid AS id, timestamp, date, body FROM entries WHERE rowid = ?'
    ).get(id);
  }

  recent(limit: number): StoredEntry[] {
    return this.db.prepare<[number], StoredEntry>(`
      SELECT rowid AS id, timestamp, date, body
      FROM entries
      ORDER BY timestamp DESC, rowid DESC
      LIMIT ?
    `).all(limit);
  }

  allEntries(): StoredEntry[] {
    return this.db.prepare<[], StoredEntry>(
      'SELECT rowid AS id, timestamp, date, body FROM entries ORDER BY rowid'
    ).all();
  }

  /** Entries whose local date falls in `year`, oldest first. */
  entriesInYear(year: number): StoredEntry[] {
    return this.db.prepare<[number], StoredEntry>(`
      SELECT rowid AS id, timestamp, date, body
      FROM entries
      WHERE CAST(strftime('%Y', date) AS INTEGER) = ?
      ORDER BY timestamp, rowid
    `).all(year);
  }

  yearCounts(): YearCount[] {
    return this.db.prepare<[], YearCount>(`
      SELECT CAST(strftime('%Y', date) AS INTEGER) AS year, count(*) AS count
      FROM entries
      GROUP BY year
      ORDER BY year DESC
    `).all();
  }

  /** Full-text search; entrytext rows pair with entries by rowid. */
  search(query: string): SearchHit[] {
    return this.db.prepare<[string], SearchHit>(`
      SELECT entries.rowid AS id, entries.timestamp AS timestamp, entries.date AS date,
        snippet(entrytext, 0, '', '', '...', 32) AS snippet
      FROM entrytext
      JOIN entries ON entrytext.rowid = entries.rowid
      WHERE entrytext MATCH ?
      ORDER BY entries.timestamp DESC
    `).all(query);
  }

  close(): void {
    this.db.close();
  }
}
