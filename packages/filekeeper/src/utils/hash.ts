/**
 * Hashing Utilities
 *
 * Content hashes for tracked files and archive records, and the stable
 * segment hash used to place archive records in index segments.
 */

import { createHash } from 'node:crypto';

/**
 * SHA-256 hex digest of file content
 */
export function hashContent(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * 32-bit FNV-1a hash. Stable across processes and platforms.
 */
export function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
