import { describe, it, expect } from 'vitest';
import {
  assertTimeZone,
  isValidTimeZone,
  localToEpochMs,
  naiveUtcMs,
  offsetAt,
  zonedFields,
} from '../src/time/zone.js';
import { DiaryError } from '../src/errors.js';
import { diaryErrorFrom } from './helpers.js';

const VANCOUVER = 'America/Vancouver';
const HOUR = 60 * 60 * 1000;

describe('zonedFields', () => {
  it('reads wall-clock fields at the epoch in UTC', () => {
    expect(zonedFields(0, 'UTC')).toEqual({ year: 1970, month: 1, day: 1, hour: 0, minute: 0, second: 0 });
  });

  it('uses hour 0 for midnight, not 24', () => {
    // 2023-01-01T08:00:00Z is local midnight in Vancouver
    expect(zonedFields(1672560000 * 1000, VANCOUVER)).toEqual({
      year: 2023, month: 1, day: 1, hour: 0, minute: 0, second: 0,
    });
  });
});

describe('naiveUtcMs', () => {
  it('keeps two-digit years literal', () => {
    const ms = naiveUtcMs({ year: 50, month: 1, day: 1, hour: 0, minute: 0 });
    expect(new Date(ms).getUTCFullYear()).toBe(50);
  });
});

describe('offsetAt', () => {
  it('follows daylight saving rules', () => {
    expect(offsetAt(Date.UTC(2023, 0, 15), VANCOUVER)).toBe(-8 * HOUR);
    expect(offsetAt(Date.UTC(2023, 6, 15), VANCOUVER)).toBe(-7 * HOUR);
    expect(offsetAt(Date.UTC(2023, 6, 15), 'Asia/Tokyo')).toBe(9 * HOUR);
  });
});

describe('localToEpochMs', () => {
  it('converts an ordinary local time', () => {
    const fields = { year: 2023, month: 2, day: 3, hour: 15, minute: 59 };
    expect(localToEpochMs(fields, VANCOUVER) / 1000).toBe(1675468740);
    expect(localToEpochMs(fields, 'UTC') / 1000).toBe(1675439940);
    expect(localToEpochMs(fields, 'Asia/Tokyo') / 1000).toBe(1675407540);
  });

  describe('spring-forward gap (2023-03-12 02:30 does not exist)', () => {
    const gap = { year: 2023, month: 3, day: 12, hour: 2, minute: 30 };

    it('shifts forward by default', () => {
      // 03:30 PDT
      expect(localToEpochMs(gap, VANCOUVER) / 1000).toBe(1678617000);
      expect(localToEpochMs(gap, VANCOUVER, 'later') / 1000).toBe(1678617000);
    });

    it('can resolve to the instant before the gap', () => {
      // 01:30 PST
      expect(localToEpochMs(gap, VANCOUVER, 'earlier') / 1000).toBe(1678613400);
    });

    it('can reject', () => {
      const err = diaryErrorFrom(() => localToEpochMs(gap, VANCOUVER, 'reject'));
      expect(err.code).toBe('NONEXISTENT_LOCAL_TIME');
      expect(err.message).toBe('2023-03-12 02:30 does not exist in America/Vancouver');
    });
  });

  describe('fall-back overlap (2023-11-05 01:30 happens twice)', () => {
    const overlap = { year: 2023, month: 11, day: 5, hour: 1, minute: 30 };

    it('picks the first occurrence by default', () => {
      expect(localToEpochMs(overlap, VANCOUVER) / 1000).toBe(1699173000);
      expect(localToEpochMs(overlap, VANCOUVER, 'earlier') / 1000).toBe(1699173000);
    });

    it('can pick the second occurrence', () => {
      expect(localToEpochMs(overlap, VANCOUVER, 'later') / 1000).toBe(1699176600);
    });

    it('can reject', () => {
      const err = diaryErrorFrom(() => localToEpochMs(overlap, VANCOUVER, 'reject'));
      expect(err.code).toBe('AMBIGUOUS_LOCAL_TIME');
      expect(err.message).toBe('2023-11-05 01:30 occurs twice in America/Vancouver');
    });
  });

  it('resolves times next to a transition unambiguously under reject', () => {
    expect(localToEpochMs({ year: 2023, month: 3, day: 11, hour: 23, minute: 59 }, VANCOUVER, 'reject') / 1000).toBe(1678607940);
    expect(localToEpochMs({ year: 2023, month: 3, day: 13, hour: 0, minute: 0 }, VANCOUVER, 'reject') / 1000).toBe(1678690800);
  });
});

describe('time zone validation', () => {
  it('accepts IANA names', () => {
    expect(isValidTimeZone(VANCOUVER)).toBe(true);
    expect(isValidTimeZone('UTC')).toBe(true);
  });

  it('rejects unknown names', () => {
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
    expect(isValidTimeZone('')).toBe(false);
    expect(() => assertTimeZone('Mars/Olympus_Mons')).toThrow(DiaryError);
    expect(() => assertTimeZone('Mars/Olympus_Mons')).toThrow('Unknown time zone: "Mars/Olympus_Mons"');
  });
});
