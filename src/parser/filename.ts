import { DiaryError } from '../errors.js';
import type { LocalDateTime } from '../model/entry.js';
import { localToEpochMs, type Disambiguation } from '../time/zone.js';
import { fileStem } from '../utils/path.js';

const INTEGER = /^-?\d+$/;

export interface TimestampOptions {
  timeZone: string;
  disambiguation?: Disambiguation;
}

/**
 * Split an entry file's base name ("2023-2-3-15-59") into its wall-clock fields.
 * A minus sign directly in front of the year is kept, so "-44-3-15-12-0" has
 * year -44; it is rejected later as an out-of-range date.
 */
export function parseEntryName(stem: string, filePath: string = stem): LocalDateTime {
  const fields = splitFields(stem);

  if (fields.length !== 5) {
    throw new DiaryError(
      `Invalid entry file name "${stem}": expected year-month-day-hour-minute, found ${fields.length} field${fields.length === 1 ? '' : 's'}`,
      'INVALID_FILENAME',
      filePath,
    );
  }

  const bad = fields.find(f => !INTEGER.test(f));
  if (bad !== undefined) {
    throw new DiaryError(
      `Invalid entry file name "${stem}": "${bad}" is not an integer`,
      'INVALID_FILENAME',
      filePath,
    );
  }

  const [year, month, day, hour, minute] = fields.map(f => parseInt(f, 10));
  return { year, month, day, hour, minute };
}

function splitFields(stem: string): string[] {
  if (stem.startsWith('-')) {
    const [first, ...rest] = stem.slice(1).split('-');
    return [`-${first}`, ...rest];
  }
  return stem.split('-');
}

export function daysInMonth(year: number, month: number): number {
  const d = new Date(0);
  d.setUTCFullYear(year, month, 0);
  return d.getUTCDate();
}

export function validateLocalDateTime(fields: LocalDateTime, filePath?: string): void {
  const { year, month, day, hour, minute } = fields;
  let problem: string | undefined;

  if (year < 1 || year > 9999) problem = `year ${year} is out of range`;
  else if (month < 1 || month > 12) problem = `month ${month} is out of range`;
  else if (day < 1 || day > daysInMonth(year, month)) problem = `day ${day} is out of range for ${year}-${month}`;
  else if (hour < 0 || hour > 23) problem = `hour ${hour} is out of range`;
  else if (minute < 0 || minute > 59) problem = `minute ${minute} is out of range`;

  if (problem) {
    throw new DiaryError(`Invalid entry date${filePath ? ` in "${filePath}"` : ''}: ${problem}`, 'INVALID_DATE', filePath);
  }
}

/** Epoch seconds of a local wall-clock time in the configured zone. */
export function timestampForFields(fields: LocalDateTime, opts: TimestampOptions, filePath?: string): number {
  validateLocalDateTime(fields, filePath);
  try {
    return Math.floor(localToEpochMs(fields, opts.timeZone, opts.disambiguation) / 1000);
  } catch (err) {
    if (err instanceof DiaryError && filePath) {
      throw new DiaryError(`${err.message} ("${filePath}")`, err.code, filePath, err);
    }
    throw err;
  }
}

/** Timestamp encoded in an entry file's name; the extension is ignored. */
export function timestampFromFilename(filePath: string, opts: TimestampOptions): number {
  const fields = parseEntryName(fileStem(filePath), filePath);
  return timestampForFields(fields, opts, filePath);
}
