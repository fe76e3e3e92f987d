/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole library.
 * - Creates the HTTP client and cache ONCE and hands them to the modules.
 * - Keeps modules testable: tests inject a fake fetch or a failing cache here.
 *
 * RULES:
 * - No business logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves.
 */

import type { AppConfig } from './config';

import type { Cache } from '../shared/cache/cache';
import { InMemCache } from '../shared/cache/inmem-cache';

import { HttpClient } from '../shared/http/http-client';
import type { FetchFn } from '../shared/http/http-client';

import { createLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { USERS_API_TIMEOUT_MS } from '../modules/users/user.constants';
import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';
import type { User } from '../modules/users/user.types';

export type AppDeps = {
  logger: Logger;
  http: HttpClient;
  userCache: Cache<User>;

  // modules
  users: UserModule;
};

export type DepsOverrides = {
  fetchFn?: FetchFn;
  userCache?: Cache<User>;
};

export function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): AppDeps {
  const logger = createLogger({
    level: config.logLevel,
    service: config.serviceName,
    env: config.nodeEnv,
  });

  const http = new HttpClient({
    timeoutMs: USERS_API_TIMEOUT_MS,
    fetchFn: overrides.fetchFn,
  });

  const userCache = overrides.userCache ?? new InMemCache<User>();

  const users = createUserModule({
    http,
    cache: userCache,
    baseUrl: config.usersApi.baseUrl,
    logger,
  });

  return {
    logger,
    http,
    userCache,
    users,
  };
}
