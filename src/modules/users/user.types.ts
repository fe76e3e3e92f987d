/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 *
 * RULES:
 * - Keep aligned with the wire format in user.schemas.ts.
 * - Avoid leaking wire naming (snake_case) outside the codec/schemas.
 * - `suspended` is a status like any other here; business validity is a separate
 *   question answered by policies/user-status.policy.ts.
 */

export type UserId = string;

export const USER_STATUSES = ['active', 'inactive', 'pending', 'suspended'] as const;

export type UserStatus = (typeof USER_STATUSES)[number];

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type UserMetadata = Record<string, JsonValue>;

export type User = {
  id: UserId;
  name: string;
  email: string;
  status: UserStatus;

  readonly createdAt: Date;

  metadata: UserMetadata;
};

export type CreateUserParams = {
  id: UserId;
  name: string;
  email: string;
  status?: UserStatus;
};

/**
 * Arbitrary key/value changes sent as the body of an update.
 */
export type UserUpdates = Record<string, JsonValue>;

export type AgeCategory = 'New' | 'Regular' | 'Veteran';

export type UserStatistics = {
  total: number;
  active: number;
  inactive: number;
  pending: number;
  suspended: number;
  averageDaysActive: number;
};
