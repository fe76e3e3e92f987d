/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Default Cache for the users manager and for tests; no external infra.
 *
 * HOW TO USE:
 * - const cache = new InMemCache<User>()
 *
 * RULES:
 * - Every read and write is one synchronous Map step, so concurrent callers on the
 *   event loop never observe a half-applied update. No lock object is needed.
 * - Values go through structuredClone on the way in and out; V must be
 *   structured-cloneable (plain objects, arrays, Dates, primitives).
 */

import type { Cache } from './cache';

export class InMemCache<V> implements Cache<V> {
  private readonly store = new Map<string, V>();

  get(key: string): Promise<V | null> {
    const value = this.store.get(key);
    return Promise.resolve(value === undefined ? null : structuredClone(value));
  }

  set(key: string, value: V): Promise<void> {
    this.store.set(key, structuredClone(value));
    return Promise.resolve();
  }

  del(key: string): Promise<boolean> {
    return Promise.resolve(this.store.delete(key));
  }

  clear(): Promise<number> {
    const count = this.store.size;
    this.store.clear();
    return Promise.resolve(count);
  }

  size(): Promise<number> {
    return Promise.resolve(this.store.size);
  }
}
