import { DiaryError } from '../errors.js';
import type { LocalDateTime } from '../model/entry.js';

export type Disambiguation = 'compatible' | 'earlier' | 'later' | 'reject';

export const DISAMBIGUATIONS: readonly Disambiguation[] = ['compatible', 'earlier', 'later', 'reject'];

const DAY_MS = 24 * 60 * 60 * 1000;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let dtf = formatters.get(timeZone);
  if (!dtf) {
    dtf = new Intl.DateTimeFormat('en-US', {
      timeZone,
      era: 'short',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, dtf);
  }
  return dtf;
}

export function isValidTimeZone(timeZone: string): boolean {
  if (timeZone.trim() === '') return false;
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function assertTimeZone(timeZone: string): void {
  if (!isValidTimeZone(timeZone)) {
    throw new DiaryError(`Unknown time zone: "${timeZone}"`, 'INVALID_TIMEZONE');
  }
}

export function isDisambiguation(value: string): value is Disambiguation {
  return (DISAMBIGUATIONS as readonly string[]).includes(value);
}

/** Wall-clock fields of an instant as observed in `timeZone`. */
export function zonedFields(epochMs: number, timeZone: string): Required<LocalDateTime> {
  const parts = formatterFor(timeZone).formatToParts(new Date(epochMs));
  const lookup = new Map(parts.map(part => [part.type, part.value] as const));
  const field = (type: Intl.DateTimeFormatPartTypes): number => Number(lookup.get(type) ?? '0');

  // "numeric" years count up from 1 in both eras
  const year = lookup.get('era') === 'BC' ? 1 - field('year') : field('year');

  return {
    year,
    month: field('month'),
    day: field('day'),
    hour: field('hour'),
    minute: field('minute'),
    second: field('second'),
  };
}

/** Epoch milliseconds of the fields read as if they were UTC. */
export function naiveUtcMs(fields: LocalDateTime): number {
  const d = new Date(0);
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  d.setUTCFullYear(fields.year, fields.month - 1, fields.day);
  d.setUTCHours(fields.hour, fields.minute, fields.second ?? 0, 0);
  return d.getTime();
}

/** UTC offset of `timeZone` at the given instant, in milliseconds (negative west of Greenwich). */
export function offsetAt(epochMs: number, timeZone: string): number {
  const wholeSecond = Math.floor(epochMs / 1000) * 1000;
  return naiveUtcMs(zonedFields(wholeSecond, timeZone)) - wholeSecond;
}

/**
 * Resolve a local wall-clock time to an instant.
 *
 * Offsets a day either side of the wall time bound the candidates; a time
 * matching both is ambiguous (fall back), one matching neither lies in a
 * gap (spring forward). Assumes the zone changes offset at most once in
 * the 48 hours around the wall time.
 */
export function localToEpochMs(
  fields: LocalDateTime,
  timeZone: string,
  disambiguation: Disambiguation = 'compatible',
): number {
  const naive = naiveUtcMs(fields);
  const offsetBefore = offsetAt(naive - DAY_MS, timeZone);
  const offsetAfter = offsetAt(naive + DAY_MS, timeZone);

  const candidates = [...new Set([naive - offsetBefore, naive - offsetAfter])]
    .filter(instant => naive - offsetAt(instant, timeZone) === instant)
    .sort((a, b) => a - b);

  if (candidates.length === 1) {
    return candidates[0];
  }

  const label = describe(fields);

  if (candidates.length > 1) {
    switch (disambiguation) {
      case 'compatible':
      case 'earlier':
        return candidates[0];
      case 'later':
        return candidates[candidates.length - 1];
      case 'reject':
        throw new DiaryError(`${label} occurs twice in ${timeZone}`, 'AMBIGUOUS_LOCAL_TIME');
    }
  }

  switch (disambiguation) {
    case 'compatible':
    case 'later':
      return naive - offsetBefore;
    case 'earlier':
      return naive - offsetAfter;
    case 'reject':
      throw new DiaryError(`${label} does not exist in ${timeZone}`, 'NONEXISTENT_LOCAL_TIME');
  }
}

function describe(fields: LocalDateTime): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${String(fields.year).padStart(4, '0')}-${pad(fields.month)}-${pad(fields.day)} ${pad(fields.hour)}:${pad(fields.minute)}`;
}
