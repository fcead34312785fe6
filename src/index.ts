// Model types
export type { Entry, StoredEntry, SearchHit, YearCount, LocalDateTime, MonthGroup } from './model/entry.js';
export { groupByMonth, MONTH_NAMES } from './model/entry.js';

// Errors
export { DiaryError, isDiaryError } from './errors.js';
export type { DiaryErrorCode } from './errors.js';

// Configuration
export { resolveConfig, INPUT_DIR, DB_FILE, DEFAULT_TIMEZONE, DEFAULT_DISAMBIGUATION } from './config.js';
export type { DiaryConfig, ConfigOverrides } from './config.js';

// Time zones and dates
export { formatLocalDate, formatUtcTimestamp } from './time/date-format.js';
export { localToEpochMs, zonedFields, offsetAt, assertTimeZone, isValidTimeZone } from './time/zone.js';
export type { Disambiguation } from './time/zone.js';

// File names
export { parseEntryName, timestampForFields, timestampFromFilename, validateLocalDateTime } from './parser/filename.js';
export type { TimestampOptions } from './parser/filename.js';

// Import
export { importDirectory, assertDirectory, readEntryBody } from './importer/directory.js';
export { addEntry } from './importer/new-entry.js';
export type { NewEntryOptions } from './importer/new-entry.js';
export type { ImportOptions, ImportSummary, ImportedEntry } from './importer/directory.js';

// Storage
export { DiaryDatabase } from './storage/database.js';
export { SCHEMA_DDL } from './storage/schema.js';

// Utilities
export { bodyHash, shortBodyHash } from './utils/hash.js';
export { fileStem } from './utils/path.js';
