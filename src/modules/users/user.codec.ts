/**
 * src/modules/users/user.codec.ts
 *
 * WHY:
 * - Single mapping between the wire shape (UserJson, snake_case, ISO timestamps)
 *   and the domain User.
 * - Used by the manager when decoding remote payloads, and for import/export.
 *
 * RULES:
 * - Status stays the lowercase token in both directions.
 * - Parsed users are not re-validated.
 * - Metadata keys are copied as own properties, so "__proto__" survives both ways.
 */

import { copyMetadata } from './user.entity';
import { UserErrors } from './user.errors';
import { userJsonSchema, type UserJson } from './user.schemas';
import type { User } from './user.types';

export function toUser(json: UserJson): User {
  return {
    id: json.id,
    name: json.name,
    email: json.email,
    status: json.status,
    createdAt: new Date(json.created_at),
    metadata: copyMetadata(json.metadata),
  };
}

export function toUserJson(user: User): UserJson {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    status: user.status,
    created_at: user.createdAt.toISOString(),
    metadata: copyMetadata(user.metadata),
  };
}

export function exportUsersJson(users: readonly User[]): string {
  return JSON.stringify(users.map(toUserJson), null, 2);
}

export function createUserFromJson(json: string): User {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw UserErrors.malformedUserJson(err);
  }

  const parsed = userJsonSchema.safeParse(raw);
  if (!parsed.success) {
    throw UserErrors.malformedUserJson(parsed.error);
  }

  return toUser(parsed.data);
}
