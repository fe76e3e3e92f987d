/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - The users manager depends on an abstraction so a remote store could replace
 *   the in-memory map without touching the manager.
 * - Async on purpose: a remote backend can reject, and the manager maps that to
 *   a storage error.
 *
 * HOW TO USE:
 * - cache.get(key)          -> copy of the stored value, or null
 * - cache.set(key, value)   -> stores a copy; overwrites
 * - cache.del(key)          -> true when an entry was removed
 * - cache.clear()           -> number of entries removed
 *
 * RULES:
 * - Values are copies both ways: mutating what you passed in or got back never
 *   changes the stored entry.
 * - No TTL, no eviction. Entries leave only through del/clear.
 */

export interface Cache<V> {
  get(key: string): Promise<V | null>;
  set(key: string, value: V): Promise<void>;
  del(key: string): Promise<boolean>;

  /**
   * Remove every entry and return how many there were.
   */
  clear(): Promise<number>;

  size(): Promise<number>;
}
