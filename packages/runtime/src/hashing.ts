// Content-derived identifiers

import { createHash } from 'node:crypto';

/**
 * First 10 hex characters of the SHA-1 of `parts` joined with "|".
 */
export function shortHash(...parts: string[]): string {
  return createHash('sha1').update(parts.join('|'), 'utf8').digest('hex').slice(0, 10);
}
