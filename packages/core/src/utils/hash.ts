import { createHash } from 'node:crypto';

/**
 * SHA-256 hex digest of raw file bytes. Used as the content hash when
 * the metadata extractor does not supply one.
 */
export function contentHash(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex');
}
