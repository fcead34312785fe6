export const ENTRY_TABLES = ['entries', 'entrytext'] as const;

export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS entries (
  timestamp INTEGER NOT NULL,
  date TEXT NOT NULL,
  body TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_entries_timestamp ON entries(timestamp);
CREATE INDEX IF NOT EXISTS idx_entries_date ON entries(date);

CREATE VIRTUAL TABLE IF NOT EXISTS entrytext USING fts5(body);
`;
