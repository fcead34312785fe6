import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { resolveConfig } from '../src/config.js';
import { diaryErrorFrom } from './helpers.js';

const cwd = join('/', 'home', 'writer');

describe('resolveConfig', () => {
  it('uses the fixed paths and default zone', () => {
    expect(resolveConfig({ cwd }, {})).toEqual({
      inputDir: join(cwd, 'docs'),
      dbPath: join(cwd, 'diary.sqlite3'),
      timeZone: 'America/Vancouver',
      disambiguation: 'compatible',
    });
  });

  it('reads the zone and disambiguation from the environment', () => {
    const config = resolveConfig({ cwd }, { DIARY_TIMEZONE: 'Asia/Tokyo', DIARY_DISAMBIGUATION: 'reject' });
    expect(config.timeZone).toBe('Asia/Tokyo');
    expect(config.disambiguation).toBe('reject');
  });

  it('prefers explicit options over the environment', () => {
    const config = resolveConfig({ cwd, timeZone: 'UTC', disambiguation: 'later' }, { DIARY_TIMEZONE: 'Asia/Tokyo' });
    expect(config.timeZone).toBe('UTC');
    expect(config.disambiguation).toBe('later');
  });

  it('ignores blank values', () => {
    expect(resolveConfig({ cwd, timeZone: '  ' }, { DIARY_TIMEZONE: '' }).timeZone).toBe('America/Vancouver');
  });

  it('rejects an unknown zone', () => {
    const err = diaryErrorFrom(() => resolveConfig({ cwd, timeZone: 'Nowhere/Special' }, {}));
    expect(err.code).toBe('INVALID_TIMEZONE');
  });

  it('rejects an unknown disambiguation', () => {
    const err = diaryErrorFrom(() => resolveConfig({ cwd, disambiguation: 'nearest' }, {}));
    expect(err.code).toBe('INVALID_OPTION');
    expect(err.message).toBe('Unknown disambiguation "nearest" (expected one of: compatible, earlier, later, reject)');
  });
});
