import { resolveConfig } from '../../config.js';
import { formatYearCounts } from '../formatters/terminal.js';
import { formatYearCountsJson } from '../formatters/json.js';
import { openDiary, type OutputFormat } from '../open.js';

export interface YearsOptions {
  cwd?: string;
  format?: OutputFormat;
}

export function yearsCommand(opts: YearsOptions = {}): void {
  const db = openDiary(resolveConfig({ cwd: opts.cwd }).dbPath);
  try {
    const counts = db.yearCounts();
    console.log(opts.format === 'json' ? formatYearCountsJson(counts) : formatYearCounts(counts));
  } finally {
    db.close();
  }
}
