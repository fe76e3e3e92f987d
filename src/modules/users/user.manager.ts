/**
 * src/modules/users/user.manager.ts
 *
 * WHY:
 * - Cache-or-fetch access to users held by the remote users API.
 * - The only place that talks to both the cache and the network.
 *
 * RULES:
 * - Cache first; the network only on a miss.
 * - Non-2xx on fetch => null. Non-2xx on update => false. Neither throws.
 * - Bodies that are not decoded are discarded through the HttpClient.
 * - Send failures throw TRANSPORT_ERROR (from HttpClient). Nothing is retried.
 * - Cache failures throw STORAGE_ERROR.
 * - Concurrent misses for the same id are NOT de-duplicated; each goes to the network.
 * - The cache is keyed by the requested id, not by the id inside the payload.
 */

import type { Cache } from '../../shared/cache/cache';
import { isAppError } from '../../shared/errors/app-error';
import type { HttpClient } from '../../shared/http/http-client';
import type { Logger } from '../../shared/logger/logger';
import { UNKNOWN_API_ERROR } from './user.constants';
import { toUser } from './user.codec';
import { UserErrors } from './user.errors';
import { userEnvelopeSchema, type UserEnvelope } from './user.schemas';
import type { User, UserId, UserUpdates } from './user.types';

export type UserManagerDeps = {
  http: HttpClient;
  cache: Cache<User>;
  baseUrl: string;
  logger: Logger;
};

export class UserManager {
  private readonly http: HttpClient;
  private readonly cache: Cache<User>;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(deps: UserManagerDeps) {
    this.http = deps.http;
    this.cache = deps.cache;
    this.baseUrl = deps.baseUrl.replace(/\/+$/, '');
    this.logger = deps.logger;
  }

  async fetchUser(userId: UserId): Promise<User | null> {
    if (userId === '') {
      throw UserErrors.userNotFound(userId);
    }

    const cached = await this.cacheCall(() => this.cache.get(userId), userId);
    if (cached) {
      this.logger.info('users.cache_hit', { userId });
      return cached;
    }

    const response = await this.http.get(this.userUrl(userId), 'Failed to send request');

    if (!response.ok) {
      await this.http.discard(response);
      this.logger.warn('users.fetch_non_success', { userId, status: response.status });
      return null;
    }

    const envelope = await this.decodeEnvelope(response, userId);

    if (!envelope.success) {
      throw UserErrors.apiError(envelope.error ?? UNKNOWN_API_ERROR, { userId });
    }

    if (!envelope.data) {
      return null;
    }

    const user = toUser(envelope.data);
    await this.cacheCall(() => this.cache.set(userId, user), userId);
    this.logger.info('users.fetched_and_cached', { userId });

    return user;
  }

  /**
   * Fetches every id concurrently. Never throws: a failed item maps to null.
   * Duplicate ids collapse into one key.
   */
  async batchFetchUsers(userIds: readonly UserId[]): Promise<Map<UserId, User | null>> {
    const results = await Promise.all(
      userIds.map(async (userId): Promise<[UserId, User | null]> => {
        try {
          return [userId, await this.fetchUser(userId)];
        } catch (err) {
          this.logger.warn('users.batch_item_failed', {
            userId,
            code: isAppError(err) ? err.code : 'UNKNOWN',
            err,
          });
          return [userId, null];
        }
      }),
    );

    return new Map(results);
  }

  /**
   * Sends the updates; on success the cached copy is evicted (not refreshed).
   */
  async updateUser(userId: UserId, updates: UserUpdates): Promise<boolean> {
    const response = await this.http.putJson(
      this.userUrl(userId),
      updates,
      'Failed to send update request',
    );
    await this.http.discard(response);

    if (!response.ok) {
      this.logger.error('users.update_failed', { userId, status: response.status });
      return false;
    }

    await this.cacheCall(() => this.cache.del(userId), userId);
    this.logger.info('users.updated', { userId });

    return true;
  }

  async clearCache(): Promise<number> {
    const count = await this.cacheCall(() => this.cache.clear());
    this.logger.info('users.cache_cleared', { count });
    return count;
  }

  private userUrl(userId: UserId): string {
    return `${this.baseUrl}/users/${encodeURIComponent(userId)}`;
  }

  private async decodeEnvelope(response: Response, userId: UserId): Promise<UserEnvelope> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw UserErrors.malformedResponse(err, { userId });
    }

    const parsed = userEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw UserErrors.malformedResponse(parsed.error, { userId });
    }

    return parsed.data;
  }

  private async cacheCall<T>(op: () => Promise<T>, userId?: UserId): Promise<T> {
    try {
      return await op();
    } catch (err) {
      throw UserErrors.storageFailed(err, userId === undefined ? undefined : { userId });
    }
  }
}
