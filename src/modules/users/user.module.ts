/**
 * src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { Cache } from '../../shared/cache/cache';
import type { HttpClient } from '../../shared/http/http-client';
import type { Logger } from '../../shared/logger/logger';
import { UserManager } from './user.manager';
import type { User } from './user.types';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  http: HttpClient;
  cache: Cache<User>;
  baseUrl: string;
  logger: Logger;
}) {
  const userManager = new UserManager(deps);

  return {
    userManager,
  };
}
