import { parse, resolve } from 'node:path';

/** File name without directory and without its last extension. */
export function fileStem(filePath: string): string {
  return parse(filePath).name;
}

export function resolveFrom(cwd: string, filePath: string): string {
  return resolve(cwd, filePath);
}
