import { DiaryError } from './errors.js';
import { assertTimeZone, DISAMBIGUATIONS, isDisambiguation, type Disambiguation } from './time/zone.js';
import { resolveFrom } from './utils/path.js';

export const INPUT_DIR = 'docs';
export const DB_FILE = 'diary.sqlite3';
export const DEFAULT_TIMEZONE = 'America/Vancouver';
export const DEFAULT_DISAMBIGUATION: Disambiguation = 'compatible';

export interface DiaryConfig {
  /** Absolute path of the directory holding one file per entry */
  inputDir: string;
  /** Absolute path of the SQLite database */
  dbPath: string;
  timeZone: string;
  disambiguation: Disambiguation;
}

export interface ConfigOverrides {
  cwd?: string;
  timeZone?: string;
  disambiguation?: string;
}

export type ConfigEnv = Record<string, string | undefined>;

/**
 * Paths are fixed relative to the working directory. The zone and the DST
 * disambiguation come from options, then DIARY_TIMEZONE / DIARY_DISAMBIGUATION,
 * then the defaults.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: ConfigEnv = process.env): DiaryConfig {
  const cwd = overrides.cwd ?? process.cwd();

  const timeZone = pick(overrides.timeZone, env.DIARY_TIMEZONE) ?? DEFAULT_TIMEZONE;
  assertTimeZone(timeZone);

  const disambiguation = pick(overrides.disambiguation, env.DIARY_DISAMBIGUATION) ?? DEFAULT_DISAMBIGUATION;
  if (!isDisambiguation(disambiguation)) {
    throw new DiaryError(
      `Unknown disambiguation "${disambiguation}" (expected one of: ${DISAMBIGUATIONS.join(', ')})`,
      'INVALID_OPTION',
    );
  }

  return {
    inputDir: resolveFrom(cwd, INPUT_DIR),
    dbPath: resolveFrom(cwd, DB_FILE),
    timeZone,
    disambiguation,
  };
}

function pick(...values: Array<string | undefined>): string | undefined {
  return values.find(v => v !== undefined && v.trim() !== '')?.trim();
}
