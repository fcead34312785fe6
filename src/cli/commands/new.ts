import chalk from 'chalk';
import { resolveConfig } from '../../config.js';
import { addEntry } from '../../importer/new-entry.js';
import type { StoredEntry } from '../../model/entry.js';
import { openDiary } from '../open.js';

export interface NewOptions {
  cwd?: string;
  timeZone?: string;
  now?: () => number;
}

export function newCommand(body: string, opts: NewOptions = {}): StoredEntry {
  const config = resolveConfig({ cwd: opts.cwd, timeZone: opts.timeZone });

  const db = openDiary(config.dbPath);
  try {
    const entry = addEntry(db, body, { timeZone: config.timeZone, now: opts.now });
    console.log(chalk.green(`Added entry #${entry.id} for ${entry.date}`));
    return entry;
  } finally {
    db.close();
  }
}
