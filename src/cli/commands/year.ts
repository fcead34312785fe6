import { resolveConfig } from '../../config.js';
import { DiaryError } from '../../errors.js';
import { groupByMonth } from '../../model/entry.js';
import { formatYear } from '../formatters/terminal.js';
import { formatYearJson } from '../formatters/json.js';
import { openDiary, type OutputFormat } from '../open.js';

export interface YearOptions {
  cwd?: string;
  format?: OutputFormat;
}

export function yearCommand(year: number, opts: YearOptions = {}): void {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new DiaryError(`Year must be an integer from 1 to 9999, got ${year}`, 'INVALID_OPTION');
  }

  const db = openDiary(resolveConfig({ cwd: opts.cwd }).dbPath);
  try {
    const months = groupByMonth(db.entriesInYear(year));
    console.log(opts.format === 'json' ? formatYearJson(year, months) : formatYear(year, months));
  } finally {
    db.close();
  }
}
