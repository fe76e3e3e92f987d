/**
 * src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Keeps shared/errors/app-error.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Put user-specific meaning here: messages + safe meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/errors/app-error';

export const UserErrors = {
  userNotFound(userId: string) {
    return AppError.notFound(`User not found: ${userId}`, { userId });
  },

  invalidEmail(email: string) {
    return new AppError({
      code: 'INVALID_EMAIL',
      message: `Invalid email format: ${email}`,
      meta: { email },
    });
  },

  emptyId() {
    return AppError.validationError('User ID cannot be empty', { field: 'id' });
  },

  emptyName() {
    return AppError.validationError('User name cannot be empty', { field: 'name' });
  },

  apiError(message: string, meta?: AppErrorMeta) {
    return AppError.apiError(`API request failed: ${message}`, { apiMessage: message, ...meta });
  },

  malformedResponse(cause: unknown, meta?: AppErrorMeta) {
    return AppError.decode('Failed to parse JSON response', cause, meta);
  },

  malformedUserJson(cause: unknown) {
    return AppError.decode('Failed to deserialize user from JSON', cause);
  },

  storageFailed(cause: unknown, meta?: AppErrorMeta) {
    return AppError.storage(cause, meta);
  },
} as const;
