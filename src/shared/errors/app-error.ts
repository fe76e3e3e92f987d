/**
 * src/shared/errors/app-error.ts
 *
 * WHY:
 * - Central error primitive used across the manager, codec and entity helpers.
 * - Callers branch on `code`, never on message text.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. users/user.errors.ts).
 * - Wrapped failures keep the original error on `cause`.
 */

export const APP_ERROR_CODES = [
  'NOT_FOUND',
  'INVALID_EMAIL',
  'VALIDATION_ERROR',
  'API_ERROR',
  'TRANSPORT_ERROR',
  'DECODE_ERROR',
  'STORAGE_ERROR',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; meta?: AppErrorMeta; cause?: unknown }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = opts.code;
    this.meta = opts.meta;
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', message, meta });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', message, meta });
  }

  static apiError(message = 'API request failed', meta?: AppErrorMeta) {
    return new AppError({ code: 'API_ERROR', message, meta });
  }

  static transport(message: string, cause: unknown, meta?: AppErrorMeta) {
    return new AppError({ code: 'TRANSPORT_ERROR', message, meta, cause });
  }

  static decode(message: string, cause: unknown, meta?: AppErrorMeta) {
    return new AppError({ code: 'DECODE_ERROR', message, meta, cause });
  }

  static storage(cause: unknown, meta?: AppErrorMeta) {
    return new AppError({ code: 'STORAGE_ERROR', message: 'Storage error', meta, cause });
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
