import type { SecurityRef } from '@yieldwatch/contracts';

/**
 * Producer of the securities a scan walks.
 *
 * Every call to `securities()` starts a fresh, finite sequence, so a source
 * can be iterated again and fetches lazily.
 */
export interface UniverseSource {
  securities(): AsyncIterable<SecurityRef>;
}
