import { existsSync } from 'node:fs';
import { DiaryError } from '../errors.js';
import { DiaryDatabase } from '../storage/database.js';

export type OutputFormat = 'terminal' | 'json';

/** Open an existing, initialized diary database. */
export function openDiary(dbPath: string): DiaryDatabase {
  if (!existsSync(dbPath)) {
    throw new DiaryError(`No diary database found at ${dbPath}. Run \`diary init\` first.`, 'DATABASE_MISSING', dbPath);
  }

  const db = new DiaryDatabase(dbPath, { fileMustExist: true });
  if (!db.hasSchema()) {
    db.close();
    throw new DiaryError(`Diary tables are missing in ${dbPath}. Run \`diary init\` first.`, 'SCHEMA_MISSING', dbPath);
  }
  return db;
}
