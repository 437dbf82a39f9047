/**
 * Identity Generator - derives the cache key for a theme and ordered fragment identifiers.
 *
 * The key depends on which fragments are requested and in what order, never on their
 * content; content edits are picked up by the mtime check in the cache validator.
 */
import { computeDigest } from '../../utils/checksum.js';

export const DEFAULT_KEY_PREFIX = 'sonar';
export const KEY_HASH_LENGTH = 30;

export type CacheKey = string;

export function computeKey(
  theme: string,
  fragmentIds: Iterable<string>,
  prefix: string = DEFAULT_KEY_PREFIX
): CacheKey {
  const joined = [...fragmentIds].join('');
  return `${prefix}-${theme}-${computeDigest(joined, KEY_HASH_LENGTH)}`;
}
