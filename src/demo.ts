/**
 * src/demo.ts
 *
 * WHY:
 * - Small runnable walkthrough: sample users -> filtering, statistics, validation,
 *   JSON export and status messages. Prints to stdout.
 * - Keeps startup logic small: load config -> build deps -> run -> exit.
 *
 * NOTE:
 * - Nothing here hits the network; fetching needs a real USERS_API_BASE_URL.
 */

import { buildConfig } from './app/config';
import { buildDeps } from './app/di';
import { logger } from './shared/logger/logger';
import {
  createUser,
  describeUserStatus,
  displayName,
  exportUsersJson,
  filterUsersByStatus,
  formatUserStatistics,
  getUserStatistics,
  validateUser,
} from './modules/users';

async function main(): Promise<void> {
  const config = buildConfig();
  const deps = buildDeps(config);

  deps.logger.info('demo.start', { env: config.nodeEnv, baseUrl: config.usersApi.baseUrl });

  const users = [
    createUser({ id: '1', name: 'John Doe', email: 'john@example.com' }),
    createUser({ id: '2', name: 'Jane Smith', email: 'jane@example.com', status: 'pending' }),
    createUser({ id: '3', name: 'Bob Johnson', email: 'bob@example.com', status: 'inactive' }),
  ];

  console.log(`Active users: ${filterUsersByStatus(users, 'active').length}`);
  console.log(`User Statistics: ${formatUserStatistics(getUserStatistics(users))}`);

  for (const user of users) {
    try {
      validateUser(user);
      console.log(`✓ User ${displayName(user)} is valid`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`✗ User ${displayName(user)} is invalid: ${message}`);
    }
  }

  console.log(`JSON Export:\n${exportUsersJson(users)}`);

  for (const user of users) {
    console.log(describeUserStatus(user));
  }

  const cleared = await deps.users.userManager.clearCache();
  deps.logger.info('demo.done', { cleared });
}

void main().catch((err: unknown) => {
  logger.error('demo.fatal_error', { err });
  process.exit(1);
});
