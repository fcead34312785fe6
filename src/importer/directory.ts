import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { DiaryError } from '../errors.js';
import type { StoredEntry } from '../model/entry.js';
import { timestampFromFilename } from '../parser/filename.js';
import type { DiaryDatabase } from '../storage/database.js';
import { formatLocalDate } from '../time/date-format.js';
import type { Disambiguation } from '../time/zone.js';

export interface ImportOptions {
  timeZone: string;
  disambiguation?: Disambiguation;
  /** Called after each file's rows are written, inside the transaction */
  onEntry?: (entry: ImportedEntry) => void;
}

export interface ImportedEntry extends StoredEntry {
  filePath: string;
}

export interface ImportSummary {
  directory: string;
  entries: ImportedEntry[];
}

export function assertDirectory(directory: string): void {
  const stats = statSync(directory, { throwIfNoEntry: false });
  if (!stats?.isDirectory()) {
    throw new DiaryError(
      stats ? `Not a directory: ${directory}` : `Input directory not found: ${directory}`,
      'INPUT_NOT_DIRECTORY',
      directory,
    );
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** File contents as UTF-8 text, byte for byte; invalid sequences fail instead of becoming U+FFFD. */
export function readEntryBody(filePath: string): string {
  const bytes = readFileSync(filePath);
  try {
    return utf8.decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) {
      throw new DiaryError(`Entry file is not valid UTF-8: ${filePath}`, 'INVALID_ENCODING', filePath, err);
    }
    throw err;
  }
}

/**
 * Import every regular file directly inside `directory`, in the order the
 * file system lists them. The run is one transaction: the first bad file
 * aborts it and nothing is written.
 */
export function importDirectory(directory: string, db: DiaryDatabase, opts: ImportOptions): ImportSummary {
  assertDirectory(directory);

  if (!db.hasSchema()) {
    throw new DiaryError('Diary tables are missing. Run `diary init` first.', 'SCHEMA_MISSING');
  }

  const entries = db.transaction(() => {
    const imported: ImportedEntry[] = [];

    for (const name of readdirSync(directory)) {
      const filePath = join(directory, name);
      // statSync follows symlinks; dangling ones are skipped
      if (!statSync(filePath, { throwIfNoEntry: false })?.isFile()) continue;

      const timestamp = timestampFromFilename(filePath, opts);
      const body = readEntryBody(filePath);
      const date = formatLocalDate(timestamp, opts.timeZone);
      const id = db.insertEntry({ timestamp, date, body });

      const entry: ImportedEntry = { id, timestamp, date, body, filePath };
      imported.push(entry);
      opts.onEntry?.(entry);
    }

    return imported;
  });

  return { directory, entries };
}
