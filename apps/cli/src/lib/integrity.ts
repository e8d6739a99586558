import crypto from 'node:crypto';
import { toContentHash, type ContentHash } from '@skillpin/shared';

/**
 * SHA-256 (lowercase hex) of the bytes exactly as fetched: no decoding,
 * no newline or whitespace normalization, so any one-byte change shows.
 */
export function digest(bytes: Uint8Array): ContentHash {
  return toContentHash(crypto.createHash('sha256').update(bytes).digest('hex'));
}

export function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.from(a.buffer, a.byteOffset, a.byteLength).equals(b);
}

export function shortHash(hash: string): string {
  return hash.slice(0, 16);
}

export function shortRevision(revision: string): string {
  return revision.slice(0, 12);
}
