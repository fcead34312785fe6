import Database from 'better-sqlite3';
import { resolveConfig } from '../../config.js';
import { DiaryError } from '../../errors.js';
import { formatSearchHits } from '../formatters/terminal.js';
import { formatSearchHitsJson } from '../formatters/json.js';
import { openDiary, type OutputFormat } from '../open.js';

export interface SearchOptions {
  cwd?: string;
  format?: OutputFormat;
}

export function searchCommand(query: string, opts: SearchOptions = {}): void {
  const db = openDiary(resolveConfig({ cwd: opts.cwd }).dbPath);

  try {
    const hits = db.search(query);
    console.log(opts.format === 'json' ? formatSearchHitsJson(query, hits) : formatSearchHits(query, hits));
  } catch (err) {
    // FTS5 reports query syntax problems as SQLITE_ERROR
    if (err instanceof Database.SqliteError && err.code === 'SQLITE_ERROR') {
      throw new DiaryError(`Invalid search query "${query}": ${err.message}`, 'INVALID_QUERY', undefined, err);
    }
    throw err;
  } finally {
    db.close();
  }
}
