/**
 * src/modules/users/policies/age-category.policy.ts
 *
 * WHY:
 * - Pure classification of how long a user has been around.
 *
 * RULES:
 * - 0..30 days inclusive => New.
 * - 31..365 days inclusive => Regular.
 * - Anything else => Veteran. That includes a negative count (createdAt in the
 *   future); it is not clamped to New.
 */

import { NEW_USER_MAX_DAYS, REGULAR_USER_MAX_DAYS } from '../user.constants';
import type { AgeCategory } from '../user.types';

export function categorizeByDaysActive(days: number): AgeCategory {
  if (days >= 0 && days <= NEW_USER_MAX_DAYS) return 'New';
  if (days > NEW_USER_MAX_DAYS && days <= REGULAR_USER_MAX_DAYS) return 'Regular';
  return 'Veteran';
}
