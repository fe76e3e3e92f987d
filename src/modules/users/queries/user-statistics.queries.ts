/**
 * src/modules/users/queries/user-statistics.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They summarise a collection of users the caller already holds.
 *
 * RULES:
 * - Read-only. Never copy or mutate the input users.
 * - Per-status counts always sum to total.
 */

import { daysActive } from '../user.entity';
import type { User, UserStatistics, UserStatus } from '../user.types';

/**
 * Same object references as the input, in input order.
 */
export function filterUsersByStatus(users: readonly User[], status: UserStatus): User[] {
  return users.filter((user) => user.status === status);
}

export function getUserStatistics(users: readonly User[], now: Date = new Date()): UserStatistics {
  const counts: Record<UserStatus, number> = { active: 0, inactive: 0, pending: 0, suspended: 0 };
  let totalDays = 0;

  for (const user of users) {
    counts[user.status] += 1;
    totalDays += daysActive(user, now);
  }

  return {
    total: users.length,
    active: counts.active,
    inactive: counts.inactive,
    pending: counts.pending,
    suspended: counts.suspended,
    averageDaysActive: users.length > 0 ? totalDays / users.length : 0,
  };
}

export function formatUserStatistics(stats: UserStatistics): string {
  return (
    `UserStats(total=${stats.total}, active=${stats.active}, inactive=${stats.inactive}, ` +
    `pending=${stats.pending}, suspended=${stats.suspended}, ` +
    `avgDays=${stats.averageDaysActive.toFixed(2)})`
  );
}
