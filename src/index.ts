/**
 * src/index.ts
 *
 * Package entrypoint. Re-exports the users module, the shared primitives callers
 * need to handle its results, and the app wiring.
 */

export * from './modules/users';

export { AppError, APP_ERROR_CODES, isAppError } from './shared/errors/app-error';
export type { AppErrorCode, AppErrorMeta } from './shared/errors/app-error';

export type { Cache } from './shared/cache/cache';
export { InMemCache } from './shared/cache/inmem-cache';

export { HttpClient } from './shared/http/http-client';
export type { FetchFn, HttpClientOptions } from './shared/http/http-client';
export { successEnvelope, errorEnvelope, toWireEnvelope } from './shared/http/envelope';
export type { ResultEnvelope, WireEnvelope } from './shared/http/envelope';

export type { Logger } from './shared/logger/logger';

export { buildConfig } from './app/config';
export type { AppConfig, NodeEnv } from './app/config';
export { buildDeps } from './app/di';
export type { AppDeps, DepsOverrides } from './app/di';
