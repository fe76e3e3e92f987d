import { describe, it, expect, vi } from 'vitest';
import { buildDeps } from '../../../src/app/di';
import type { AppConfig } from '../../../src/app/config';
import { createUser } from '../../../src/modules/users/user.entity';
import type { User } from '../../../src/modules/users/user.types';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { USERS_API_TIMEOUT_MS } from '../../../src/modules/users/user.constants';
import { createFakeUsersApi } from '../../helpers/fake-users-api';

function testConfig(baseUrl: string, nodeEnv: AppConfig['nodeEnv'] = 'test'): AppConfig {
  return {
    nodeEnv,
    logLevel: 'error',
    serviceName: 'user-directory-test',
    usersApi: { baseUrl },
  };
}

describe('buildDeps', () => {
  it('wires the users manager to the configured base url and injected fetch', async () => {
    const api = createFakeUsersApi();
    api.serveUser(createUser({ id: '1', name: 'Alice', email: 'alice@example.com' }));

    const deps = buildDeps(testConfig(api.baseUrl), { fetchFn: api.fetchFn });
    const user = await deps.users.userManager.fetchUser('1');

    expect(user?.name).toBe('Alice');
    expect(api.requests.map((r) => r.url)).toEqual(['https://users.test/users/1']);
    await expect(deps.userCache.size()).resolves.toBe(1);
  });

  it('uses an injected cache', async () => {
    const api = createFakeUsersApi();
    const userCache = new InMemCache<User>();
    await userCache.set('1', createUser({ id: '1', name: 'Cached', email: 'c@example.com' }));

    const deps = buildDeps(testConfig(api.baseUrl), { fetchFn: api.fetchFn, userCache });
    const user = await deps.users.userManager.fetchUser('1');

    expect(user?.name).toBe('Cached');
    expect(api.requests).toHaveLength(0);
  });

  it('builds the logger from config: level, service and silence under test', () => {
    const quiet = buildDeps(testConfig('https://users.test'));
    const loud = buildDeps(testConfig('https://users.test', 'development'));

    expect(quiet.logger.level).toBe('error');
    expect(quiet.logger.silent).toBe(true);
    expect(quiet.logger.defaultMeta).toEqual({ service: 'user-directory-test', env: 'test' });
    expect(loud.logger.silent).toBe(false);
    expect(loud.logger.defaultMeta).toEqual({ service: 'user-directory-test', env: 'development' });
  });

  it('gives the HTTP client the fixed 5000 ms timeout', async () => {
    const api = createFakeUsersApi();
    const timeout = vi.spyOn(AbortSignal, 'timeout');

    const deps = buildDeps(testConfig(api.baseUrl), { fetchFn: api.fetchFn });
    await deps.users.userManager.fetchUser('1');

    expect(USERS_API_TIMEOUT_MS).toBe(5000);
    expect(deps.http.timeoutMs).toBe(5000);
    expect(timeout).toHaveBeenCalledWith(5000);
  });
});
