/**
 * src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent deep imports into /policies or /queries from outside the module.
 */

export {
  createUser,
  isActive,
  displayName,
  daysActive,
  withStatus,
  addMetadata,
  validateUser,
  getAgeCategory,
  describeUserStatus,
  formatUser,
} from './user.entity';
export { isValidEmail } from './policies/email-format.policy';
export { isValidStatus, statusLabel } from './policies/user-status.policy';
export {
  filterUsersByStatus,
  getUserStatistics,
  formatUserStatistics,
} from './queries/user-statistics.queries';
export { exportUsersJson, createUserFromJson, toUser, toUserJson } from './user.codec';
export { UserErrors } from './user.errors';
export { UserManager } from './user.manager';
export type { UserManagerDeps } from './user.manager';
export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export type { UserJson } from './user.schemas';
export { USER_STATUSES } from './user.types';
export type {
  AgeCategory,
  CreateUserParams,
  JsonValue,
  User,
  UserId,
  UserMetadata,
  UserStatistics,
  UserStatus,
  UserUpdates,
} from './user.types';
