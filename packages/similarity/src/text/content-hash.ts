import { createHash } from 'node:crypto';

/** SHA-256 hex digest of page or submission text. */
export function computeContentHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}
