/* src/runner/util/hash.ts
 * SHA-256 fingerprint of snippet bodies.
 */
import { createHash } from 'node:crypto';

/**
 * Fingerprint a snippet body: SHA-256 of its UTF-8 bytes, lowercase hex.
 */
export const fingerprint = (body: string | Buffer): string =>
  createHash('sha256').update(body).digest('hex');

export const FINGERPRINT_RE = /^[0-9a-f]{64}$/;
