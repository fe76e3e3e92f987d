/**
 * src/modules/users/user.constants.ts
 */

export const USERS_API_TIMEOUT_MS = 5_000;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Inclusive upper bounds, in whole days active.
export const NEW_USER_MAX_DAYS = 30;
export const REGULAR_USER_MAX_DAYS = 365;

export const UNKNOWN_API_ERROR = 'Unknown error';
