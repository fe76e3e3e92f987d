/**
 * src/modules/users/user.entity.ts
 *
 * WHY:
 * - Construction and small behaviours of a User, as plain functions over a plain
 *   object (users are cached with structuredClone, so no class prototypes).
 *
 * RULES:
 * - Email format is checked in createUser and validateUser only. Assigning a field
 *   afterwards does not re-validate.
 * - withStatus returns a copy; addMetadata mutates in place.
 */

import { MS_PER_DAY } from './user.constants';
import { UserErrors } from './user.errors';
import { isValidEmail } from './policies/email-format.policy';
import { categorizeByDaysActive } from './policies/age-category.policy';
import { describeStatus, statusLabel } from './policies/user-status.policy';
import type {
  AgeCategory,
  CreateUserParams,
  JsonValue,
  User,
  UserMetadata,
  UserStatus,
} from './user.types';

export function createUser(params: CreateUserParams): User {
  if (!isValidEmail(params.email)) {
    throw UserErrors.invalidEmail(params.email);
  }

  return {
    id: params.id,
    name: params.name,
    email: params.email,
    status: params.status ?? 'active',
    createdAt: new Date(),
    metadata: {},
  };
}

export function isActive(user: User): boolean {
  return user.status === 'active';
}

export function displayName(user: User): string {
  return user.name !== '' ? user.name : user.email;
}

/**
 * Whole days between createdAt and `now`, truncated toward zero.
 */
export function daysActive(user: User, now: Date = new Date()): number {
  return Math.trunc((now.getTime() - user.createdAt.getTime()) / MS_PER_DAY);
}

export function withStatus(user: User, status: UserStatus): User {
  const copy = structuredClone(user);
  copy.status = status;
  return copy;
}

// Plain assignment would treat "__proto__" as the prototype setter.
function defineEntry(metadata: UserMetadata, key: string, value: JsonValue): void {
  Object.defineProperty(metadata, key, { value, enumerable: true, writable: true, configurable: true });
}

export function addMetadata(user: User, key: string, value: JsonValue): void {
  defineEntry(user.metadata, key, value);
}

/**
 * Shallow copy that keeps every own key, "__proto__" included.
 */
export function copyMetadata(source: UserMetadata): UserMetadata {
  const copy: UserMetadata = {};
  for (const [key, value] of Object.entries(source)) {
    defineEntry(copy, key, value);
  }
  return copy;
}

/**
 * Throws the first problem found: empty id, then empty name, then email format.
 */
export function validateUser(user: User): void {
  if (user.id === '') throw UserErrors.emptyId();
  if (user.name === '') throw UserErrors.emptyName();
  if (!isValidEmail(user.email)) throw UserErrors.invalidEmail(user.email);
}

export function getAgeCategory(user: User, now: Date = new Date()): AgeCategory {
  return categorizeByDaysActive(daysActive(user, now));
}

export function describeUserStatus(user: User): string {
  return describeStatus(displayName(user), user.status);
}

export function formatUser(user: User): string {
  return `User(id=${user.id}, name=${user.name}, email=${user.email}, status=${statusLabel(user.status)})`;
}
