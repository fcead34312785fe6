import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DiaryError } from '../src/errors.js';

export function diaryErrorFrom(fn: () => unknown): DiaryError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DiaryError) return err;
    throw err;
  }
  throw new Error('Expected a DiaryError to be thrown');
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'diary-test-'));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Create `dir` if needed and write each name → body pair into it. */
export function writeEntries(dir: string, files: Record<string, string>): void {
  mkdirSync(dir, { recursive: true });
  for (const [name, body] of Object.entries(files)) {
    writeFileSync(join(dir, name), body, 'utf-8');
  }
}
