import { describe, it, expect } from 'vitest';
import { formatLocalDate, formatUtcTimestamp } from '../src/time/date-format.js';
import { timestampForFields } from '../src/parser/filename.js';

const VANCOUVER = 'America/Vancouver';

describe('formatLocalDate', () => {
  it('formats the local calendar date with zero padding', () => {
    expect(formatLocalDate(1675468740, VANCOUVER)).toBe('2023-02-03');
    expect(formatLocalDate(1672560300, VANCOUVER)).toBe('2023-01-01');
  });

  it('uses the local day, not the UTC day', () => {
    // 2022-12-31 23:30 in Vancouver is already 2023-01-01 in UTC
    expect(formatLocalDate(1672558200, VANCOUVER)).toBe('2022-12-31');
    expect(formatLocalDate(1672558200, 'UTC')).toBe('2023-01-01');
  });

  it('handles the days around the spring-forward transition', () => {
    expect(formatLocalDate(1678607940, VANCOUVER)).toBe('2023-03-11');
    expect(formatLocalDate(1678617000, VANCOUVER)).toBe('2023-03-12');
    expect(formatLocalDate(1678690800, VANCOUVER)).toBe('2023-03-13');
  });

  it('pads years below 1000 to four digits', () => {
    const ts = timestampForFields({ year: 999, month: 1, day: 1, hour: 12, minute: 0 }, { timeZone: 'UTC' });
    expect(formatLocalDate(ts, 'UTC')).toBe('0999-01-01');
  });

  it('gives back the calendar date of the local fields it was built from', () => {
    const cases = [
      { year: 2023, month: 1, day: 1, hour: 0, minute: 5 },
      { year: 2023, month: 3, day: 12, hour: 1, minute: 59 },
      { year: 2023, month: 6, day: 30, hour: 23, minute: 59 },
      { year: 2023, month: 11, day: 5, hour: 1, minute: 30 },
      { year: 2024, month: 2, day: 29, hour: 12, minute: 0 },
      { year: 1999, month: 12, day: 31, hour: 23, minute: 0 },
    ];

    for (const fields of cases) {
      const ts = timestampForFields(fields, { timeZone: VANCOUVER });
      const expected = `${fields.year}-${String(fields.month).padStart(2, '0')}-${String(fields.day).padStart(2, '0')}`;
      expect(formatLocalDate(ts, VANCOUVER)).toBe(expected);
    }
  });
});

describe('formatUtcTimestamp', () => {
  it('renders whole seconds without milliseconds', () => {
    expect(formatUtcTimestamp(1675468740)).toBe('2023-02-03T23:59:00Z');
  });
});
