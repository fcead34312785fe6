import { createHash } from 'node:crypto';

/** Hex SHA-256 of an entry body, as shown next to a single entry. */
export function bodyHash(body: string): string {
  return createHash('sha256').update(body, 'utf8').digest('hex');
}

export function shortBodyHash(body: string, length = 12): string {
  return bodyHash(body).slice(0, length);
}
