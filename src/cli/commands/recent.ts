import { resolveConfig } from '../../config.js';
import { DiaryError } from '../../errors.js';
import { formatEntryList } from '../formatters/terminal.js';
import { formatEntryListJson } from '../formatters/json.js';
import { openDiary, type OutputFormat } from '../open.js';

export interface RecentOptions {
  cwd?: string;
  count?: number;
  format?: OutputFormat;
}

export const DEFAULT_RECENT_COUNT = 8;

export function recentCommand(opts: RecentOptions = {}): void {
  const count = opts.count ?? DEFAULT_RECENT_COUNT;
  if (!Number.isInteger(count) || count < 1) {
    throw new DiaryError(`Count must be a positive integer, got ${count}`, 'INVALID_OPTION');
  }

  const db = openDiary(resolveConfig({ cwd: opts.cwd }).dbPath);
  try {
    const entries = db.recent(count);
    console.log(opts.format === 'json' ? formatEntryListJson(entries) : formatEntryList(entries));
  } finally {
    db.close();
  }
}
