/**
 * src/modules/users/policies/user-status.policy.ts
 *
 * WHY:
 * - Pure decisions about a status value, kept apart from the type itself.
 *
 * RULES:
 * - Business validity is active | inactive | pending. `suspended` is a real status
 *   but is NOT valid in this sense. Keep that asymmetry.
 */

import type { UserStatus } from '../user.types';

export function isValidStatus(status: UserStatus): boolean {
  return status === 'active' || status === 'inactive' || status === 'pending';
}

const STATUS_LABELS: Record<UserStatus, string> = {
  active: 'Active',
  inactive: 'Inactive',
  pending: 'Pending',
  suspended: 'Suspended',
};

export function statusLabel(status: UserStatus): string {
  return STATUS_LABELS[status];
}

/**
 * One-line human description of where the user stands, e.g. "Jane is awaiting approval".
 * `name` is the already-resolved display name.
 */
export function describeStatus(name: string, status: UserStatus): string {
  switch (status) {
    case 'active':
      return `${name} is currently active`;
    case 'pending':
      return `${name} is awaiting approval`;
    case 'inactive':
      return `${name} is not active`;
    case 'suspended':
      return `${name} has been suspended`;
  }
}
