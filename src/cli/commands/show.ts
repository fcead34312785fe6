import { resolveConfig } from '../../config.js';
import { DiaryError } from '../../errors.js';
import { formatEntry } from '../formatters/terminal.js';
import { formatEntryJson } from '../formatters/json.js';
import { openDiary, type OutputFormat } from '../open.js';

export interface ShowOptions {
  cwd?: string;
  format?: OutputFormat;
}

export function showCommand(id: number, opts: ShowOptions = {}): void {
  if (!Number.isInteger(id) || id < 1) {
    throw new DiaryError(`Entry id must be a positive integer, got ${id}`, 'INVALID_OPTION');
  }

  const db = openDiary(resolveConfig({ cwd: opts.cwd }).dbPath);
  try {
    const entry = db.getEntry(id);
    if (!entry) {
      throw new DiaryError(`No entry with id ${id}`, 'ENTRY_NOT_FOUND');
    }
    console.log(opts.format === 'json' ? formatEntryJson(entry) : formatEntry(entry));
  } finally {
    db.close();
  }
}
