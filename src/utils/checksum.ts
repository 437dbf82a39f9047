/**
 * SHA-256 digests used for cache identities.
 */
import { createHash } from 'node:crypto';

/**
 * Compute a SHA-256 digest of the given content, base64url encoded
 * (filename safe: `A-Z a-z 0-9 - _`, no padding), truncated to `length`.
 */
export function computeDigest(content: string, length: number): string {
  return createHash('sha256').update(content).digest('base64url').slice(0, length);
}
