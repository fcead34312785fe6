export type DiaryErrorCode =
  | 'INVALID_FILENAME'
  | 'INVALID_DATE'
  | 'NONEXISTENT_LOCAL_TIME'
  | 'AMBIGUOUS_LOCAL_TIME'
  | 'INVALID_TIMEZONE'
  | 'INVALID_OPTION'
  | 'INPUT_NOT_DIRECTORY'
  | 'SCHEMA_MISSING'
  | 'DATABASE_MISSING'
  | 'ENTRY_NOT_FOUND'
  | 'INVALID_QUERY'
  | 'INVALID_ENCODING'
  | 'EMPTY_ENTRY';

export class DiaryError extends Error {
  constructor(
    message: string,
    public readonly code: DiaryErrorCode,
    public readonly filePath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'DiaryError';
    Object.setPrototypeOf(this, DiaryError.prototype);
  }
}

export function isDiaryError(err: unknown): err is DiaryError {
  return err instanceof DiaryError;
}
